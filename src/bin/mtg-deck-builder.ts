#!/usr/bin/env node

// CHANGE: Standalone binary for the deck-builder subcommand
// WHY: APP returns ExitCode; BIN exits the process
// REF: shell/runtime.ts
// SOURCE: n/a
// PURITY: SHELL (BIN layer)

import { processRunContext } from "../app/context.js";
import { runDeckBuilder } from "../app/deckBuilder.js";
import { runCli } from "../shell/runtime.js";

runCli(runDeckBuilder(process.argv.slice(2), processRunContext()));

#!/usr/bin/env node

// CHANGE: Standalone binary for the card-search subcommand
// WHY: APP returns ExitCode; BIN exits the process
// REF: shell/runtime.ts
// SOURCE: n/a
// PURITY: SHELL (BIN layer)

import { runCardSearch } from "../app/cardSearch.js";
import { processRunContext } from "../app/context.js";
import { runCli } from "../shell/runtime.js";

runCli(runCardSearch(process.argv.slice(2), processRunContext()));

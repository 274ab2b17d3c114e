#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper for mtg-card-app - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// REF: shell/runtime.ts
// SOURCE: n/a
// PURITY: SHELL (BIN layer)

import { main } from "../main.js";
import { runCli } from "../shell/runtime.js";

runCli(main(process.argv.slice(2)));

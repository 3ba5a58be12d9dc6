#!/usr/bin/env node
/**
 * drift-gate CLI. Exit codes: 0 PASS, 1 WARN, 2 FAIL, 3 error.
 */

import { main } from "../src/cli/validate.js";

process.exitCode = main(process.argv.slice(2));

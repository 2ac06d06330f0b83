#!/usr/bin/env tsx

/**
 * Command-line entry point
 */

import { handleEvaluateCommand } from "../src/cli";

process.exitCode = await handleEvaluateCommand(process.argv.slice(2));

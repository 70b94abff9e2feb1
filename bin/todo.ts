#!/usr/bin/env tsx
import { runCLI } from "../src/cli/index.ts";

const exitCode = await runCLI(process.argv.slice(2));
process.exit(exitCode);

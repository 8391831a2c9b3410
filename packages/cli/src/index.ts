#!/usr/bin/env node

/**
 * os-family CLI
 * Main entry point
 */

import { createProgram, run } from "./program.js";

const program = createProgram();

void run(process.argv, program);

export { program };

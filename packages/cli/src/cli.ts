#!/usr/bin/env node

/**
 * idxmeta CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);

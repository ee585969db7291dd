#!/usr/bin/env node
/**
 * Generate and decode UXIDs
 *
 * Usage:
 *   npm run uxid -- generate [--prefix <p>] [--size <preset>] [--count <n>]
 *   npm run uxid -- decode <uxid>...
 */

import { runCli } from '../src/cli.js';

process.exitCode = runCli(process.argv.slice(2));

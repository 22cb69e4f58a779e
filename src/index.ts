#!/usr/bin/env node
/**
 * hn-narrator - Hacker News front page as bilingual narrated audio
 *
 * Main entry point for the command line tool.
 */
import { main } from './cli.js';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('[hn-narrator] Unexpected error:', err);
    process.exitCode = 1;
  }
);

#!/usr/bin/env node
import { main } from '../src/cli/main.js';

main().then(
  (code) => {
    process.exitCode = code;
    // stdin was resumed for key input; nothing else should keep the process alive.
    process.stdin.pause();
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);

// src/main.ts
import { runCli } from './cli/Cli';

process.exitCode = runCli(process.argv.slice(2));

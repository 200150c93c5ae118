#!/usr/bin/env node
import 'reflect-metadata';
import { loadEnvFile } from './config/app-config';
import { bootstrap } from './bootstrap';

loadEnvFile();

bootstrap(process.argv.slice(2), { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  });

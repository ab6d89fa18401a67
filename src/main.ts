#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './cli';

runCli(process.argv.slice(2), { out: line => console.log(line), env: process.env })
  // An in-flight request past the deadline must not hold the process open.
  .then(code => process.exit(code))
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });

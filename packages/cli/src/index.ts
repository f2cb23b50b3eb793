#!/usr/bin/env node
import { buildProgram } from './program';

const program = buildProgram({
  out: (line) => console.log(line),
  err: (line) => console.error(line)
});

program.parseAsync().catch((error) => {
  console.error(error);
  process.exit(1);
});

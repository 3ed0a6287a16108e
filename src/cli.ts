#!/usr/bin/env node

import { createProgram } from "./cli/program";
import { createProcessIO } from "./cli/run-rewrite";

const program = createProgram(createProcessIO(), (code) => {
  process.exitCode = code;
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error("执行失败:", error);
  process.exit(1);
});

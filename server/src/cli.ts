#!/usr/bin/env node
import * as os from "os";

import { runLint } from "./lint-cli";

runLint(process.argv.slice(2), {
  cwd: process.cwd(),
  home: os.homedir(),
  out: (text) => console.log(text),
  err: (text) => console.error(text),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error(e instanceof Error ? (e.stack ?? e.message) : String(e));
    process.exitCode = 2;
  });

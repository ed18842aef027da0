#!/usr/bin/env node
import { hideBin } from "yargs/helpers";

import { runCli } from "./cli";

runCli(hideBin(process.argv)).then(
  (code) => {
    process.exitCode = code;
  },
  (error) => {
    console.error(error);
    process.exitCode = 1;
  }
);

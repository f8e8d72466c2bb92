#!/usr/bin/env node
import { ExitCode, main } from "./cli";

main(process.argv).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(err);
    process.exit(ExitCode.Error);
  },
);

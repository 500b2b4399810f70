#!/usr/bin/env node
import { bootstrap } from "./cli";

bootstrap(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);

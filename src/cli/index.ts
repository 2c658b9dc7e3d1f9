#!/usr/bin/env node
import * as dotenv from "dotenv";
import { run } from "./run";

dotenv.config();

run(process.argv.slice(2), {
  env: process.env,
  interactive: Boolean(process.stdin.isTTY),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);

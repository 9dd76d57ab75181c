#!/usr/bin/env -S node --import tsx
import { loadConfig } from "@ytarchive/config";
import { run } from "./cli.js";

const config = loadConfig();

run(process.argv, { apiBaseUrl: config.apiBaseUrl, dataDir: config.dataDir })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  });

#!/usr/bin/env node
import { linuxDepsCommand, defaultCliDeps } from "./commands.js";
import { logger } from "../logger.js";

linuxDepsCommand(process.argv.slice(2), defaultCliDeps())
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ error: err }, "Fatal error");
    process.exitCode = 1;
  });

#!/usr/bin/env node
import { EXIT_RUN_FAILED, main } from "./cli.js";
import { errorMessage, logger } from "./logger.js";

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error("fatal", { error: errorMessage(err) });
    process.exitCode = EXIT_RUN_FAILED;
  });

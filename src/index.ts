#!/usr/bin/env node
// Must stay first: the logger reads LOG_LEVEL while its module loads.
import "dotenv/config";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { startServer } from "./server.js";

startServer().then(
  () => process.exit(0),
  (error: unknown) => {
    logger.fatal({ err: errorMessage(error) }, "agent-relay failed to start");
    process.exit(1);
  }
);

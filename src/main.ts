#!/usr/bin/env node
import "dotenv/config";

import { describeError } from "./core/errors.js";
import { loadConfig } from "./cli/config.js";
import { parseCommand, runTokenize, runWeights } from "./cli/commands.js";
import { createChildLogger } from "./utils/logger.js";

try {
  const command = parseCommand(process.argv.slice(2));
  const config = loadConfig();
  const logger = createChildLogger({ command });

  if (command === "tokenize") {
    await runTokenize(config, logger);
    console.log(`HTML files from ${config.importDir} are now tokenized and exported to ${config.exportDir}`);
  } else {
    await runWeights(config, logger);
    console.log(`TXT files from ${config.importDir} are now tokenized and exported to ${config.exportDir}`);
  }
} catch (e) {
  console.error(describeError(e));
  process.exitCode = 1;
}

#!/usr/bin/env node
/* eslint-disable no-console */
import process from "node:process";
import { start, SERVER_NAME, SERVER_VERSION } from "./server.js";
import { logger } from "./logger.js";

function parseArguments(args: string[]) {
  let showHelp = false;
  let showVersion = false;
  let dataPath: string | undefined;

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === "--help" || arg === "-h") {
      showHelp = true;
    } else if (arg === "--version" || arg === "-v") {
      showVersion = true;
    } else if (arg === "--data") {
      dataPath = args[index + 1];
      index += 1;
    } else if (arg.startsWith("--data=")) {
      dataPath = arg.slice("--data=".length);
    }
  }

  return { showHelp, showVersion, dataPath };
}

function printHelp(): void {
  console.log(
    `${SERVER_NAME} v${SERVER_VERSION}\n\n` +
      `Usage: ${SERVER_NAME} [options]\n\n` +
      `Options:\n` +
      `  --data <file>  JSON file holding recorded tests and settings\n` +
      `                 (default: $METER_TESTS_DATA_PATH or ./data/meter-tests.json)\n` +
      `  --help, -h     Show this help message\n` +
      `  --version, -v  Print the current version`,
  );
}

async function main(): Promise<void> {
  const cliOptions = parseArguments(process.argv.slice(2));

  if (cliOptions.showVersion) {
    console.log(`${SERVER_NAME} v${SERVER_VERSION}`);
    return;
  }

  if (cliOptions.showHelp) {
    printHelp();
    return;
  }

  if (cliOptions.dataPath) {
    process.env.METER_TESTS_DATA_PATH = cliOptions.dataPath;
  }

  try {
    await start();
  } catch (error) {
    logger.error(`Failed to start ${SERVER_NAME} server`, "cli", { error });
    process.exitCode = 1;
  }
}

void main();

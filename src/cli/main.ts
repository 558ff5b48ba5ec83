#!/usr/bin/env node
import { loadConfig } from "../config/index.js";
import { logger, setLogLevel } from "../config/logger.js";
import { openDatabase } from "../db/index.js";
import { DrizzleInstanceRecordRepository } from "../instances/drizzle-instance-record-repository.js";
import { LambdaCloudClient } from "../lambda/lambda-client.js";
import { LambdaInstanceProvider } from "../lambda/lambda-instance-provider.js";
import { InstanceLifecycle } from "../launch/instance-lifecycle.js";
import { fanOut, logLaunchEvent } from "../launch/launch-events.js";
import { type CliCommand, CliError, parseCliArgs, USAGE } from "./args.js";
import { EXIT_CANCELLED, EXIT_FAILURE, EXIT_OK, runCommand } from "./commands.js";
import { createProgressPrinter, describeThrown } from "./format.js";

export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
};

export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  process.exit(EXIT_FAILURE);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

const print = (line: string) => process.stdout.write(`${line}\n`);
const printErr = (line: string) => process.stderr.write(`${line}\n`);

function needsApi(command: CliCommand): boolean {
  return command.name !== "help" && !(command.name === "list" && command.resource === "history");
}

async function main(argv: readonly string[]): Promise<number> {
  const { command, configPath, overrides } = parseCliArgs(argv);
  if (command.name === "help") {
    print(USAGE);
    return EXIT_OK;
  }

  const config = await loadConfig({ configPath: configPath ?? undefined, overrides });
  setLogLevel(config.logLevel);
  if (needsApi(command) && config.api.apiKey === "") {
    throw new CliError("Missing API key: set LAMBDA_API_KEY or api.apiKey in devbox.yaml");
  }

  // First Ctrl-C cancels cleanly, the second exits at once.
  const controller = new AbortController();
  process.on("SIGINT", () => {
    if (controller.signal.aborted) process.exit(EXIT_CANCELLED);
    printErr("Cancelling...");
    controller.abort();
  });

  const client = new LambdaCloudClient(config.api.apiKey, {
    baseUrl: config.api.baseUrl,
    timeoutMs: config.api.timeoutMs,
  });
  const progress = createProgressPrinter(printErr);
  const lifecycle = new InstanceLifecycle(new LambdaInstanceProvider(client), {
    onEvent: config.logLevel === "debug" ? fanOut(progress, logLaunchEvent) : progress,
  });

  const { sqlite, db } = openDatabase(config.dbPath);
  try {
    return await runCommand(command, {
      config,
      client,
      lifecycle,
      records: new DrizzleInstanceRecordRepository(db),
      print,
      error: printErr,
      signal: controller.signal,
    });
  } finally {
    sqlite.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    for (const line of describeThrown(err)) printErr(line);
    if (!(err instanceof CliError)) {
      logger.debug("Command failed", { stack: err instanceof Error ? err.stack : undefined });
    }
    process.exitCode = EXIT_FAILURE;
  });

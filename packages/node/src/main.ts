#!/usr/bin/env node
import process, { argv, env, exit, stderr, stdin, stdout } from "node:process";
import { isCellTermError } from "@cellterm/core";
import { runCellTerm, restoreTerminal } from "./app.js";
import { USAGE, parseArgs, readEnvConfig } from "./config.js";
import { closeLogger, createLogger, toSessionLogger } from "./logger.js";

async function main(): Promise<number> {
  let options: ReturnType<typeof parseArgs>;
  let envConfig: ReturnType<typeof readEnvConfig>;
  try {
    options = parseArgs(argv.slice(2));
    envConfig = readEnvConfig(env);
  } catch (err) {
    if (!isCellTermError(err)) throw err;
    stderr.write(`${err.message}\n\n${USAGE}`);
    return 2;
  }

  if (options.help) {
    stdout.write(USAGE);
    return 0;
  }

  const logger = createLogger(envConfig);
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    logger.info(`starting with ${JSON.stringify(options)}`);
    const summary = await runCellTerm(
      options,
      { stdin, stdout },
      { logger: toSessionLogger(logger), signal: controller.signal },
    );
    const { ticks, generations, population } = summary;
    logger.info(
      `stopped after ${String(ticks)} ticks, ${String(generations)} generations, population ${String(population)}`,
    );
    return 0;
  } catch (err) {
    if (!isCellTermError(err)) throw err;
    logger.error(err.message);
    stderr.write(`${err.message}\n`);
    return 1;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await closeLogger(logger);
  }
}

try {
  exit(await main());
} catch (err) {
  restoreTerminal(stdin, stdout);
  stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
  exit(1);
}

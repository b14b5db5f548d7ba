#!/usr/bin/env node
import "dotenv/config";
import { loadConfig, loadEnv } from "./config.js";
import { errorMessage } from "./lib/errors.js";
import { createFetcher } from "./lib/http.js";
import { NdjsonLedger } from "./ledger.js";
import { createLogger } from "./logger.js";
import { runIndexIngest, runMonitor } from "./monitor.js";
import { createNotifier } from "./notify/mailer.js";
import { parseQuarter } from "./pipeline/periods.js";
import { JsonStateStore } from "./state.js";

type Command = "run" | "ingest-index";

function isCommand(value: string): value is Command {
  return value === "run" || value === "ingest-index";
}

function parseArgs(argv: string[]) {
  const first = argv[0];
  let command: Command = "run";
  if (first && !first.startsWith("--")) {
    if (!isCommand(first)) {
      throw new Error(`Unknown command: ${first}. Use run | ingest-index.`);
    }
    command = first;
  }

  const configIdx = argv.indexOf("--config");
  const configPath = configIdx >= 0 ? argv[configIdx + 1] : undefined;
  if (configIdx >= 0 && !configPath) {
    throw new Error("Usage: --config <path>.");
  }

  const quarterIdx = argv.indexOf("--quarter");
  const quarterRaw = quarterIdx >= 0 ? argv[quarterIdx + 1] : undefined;
  const quarter = quarterRaw ? parseQuarter(quarterRaw) : null;
  if (command === "ingest-index" && !quarter) {
    throw new Error("Usage: ingest-index --quarter YYYYQn.");
  }
  return { command, configPath, quarter };
}

async function main() {
  const { command, configPath, quarter } = parseArgs(process.argv.slice(2));
  const env = loadEnv();
  const logger = createLogger(env);
  const config = await loadConfig(configPath ?? env.MONITOR_CONFIG, env);

  const deps = {
    fetcher: createFetcher({ userAgent: config.userAgent, ...config.http }),
    ledger: new NdjsonLedger(config.ledgerPath),
    stateStore: new JsonStateStore(config.statePath),
    notifier: createNotifier(config.notification, env.SMTP_PASSWORD),
    logger
  };

  const summary =
    command === "ingest-index" && quarter
      ? await runIndexIngest(deps, config, quarter)
      : await runMonitor(deps, config);
  process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
}

main().catch((error) => {
  console.error(`[insider-watch] Failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});

import path from "node:path";
import { z } from "zod";
import { ConfigError, errorMessage } from "./lib/errors.js";
import { readJsonIfExists } from "./lib/files.js";

export const DEFAULT_FEED_URL =
  "https://www.sec.gov/cgi-bin/browse-edgar?action=getcurrent&type=4&company=&dateb=&owner=include&start=0&count=100&output=atom";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  MONITOR_CONFIG: z.string().min(1).default("config.json"),
  SMTP_PASSWORD: z.string().min(1).optional()
});

export type Env = z.infer<typeof EnvSchema>;

const AlertRuleSchema = z.object({
  enabled: z.boolean().default(true),
  tickers: z.array(z.string().trim().min(1)).default([]),
  requiredCode: z.string().trim().length(1).default("P"),
  minValueUsd: z.number().nonnegative().default(0)
});

const NotificationSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().optional(),
  port: z.number().int().positive().default(587),
  secure: z.boolean().default(false),
  username: z.string().optional(),
  from: z.string().optional(),
  to: z.array(z.string().email()).default([])
});

const HttpSchema = z.object({
  timeoutMs: z.number().int().positive().default(30_000),
  retries: z.number().int().min(0).max(10).default(3),
  backoffMs: z.number().int().min(0).default(1_000)
});

export const ConfigSchema = z.object({
  feedUrl: z.string().url().default(DEFAULT_FEED_URL),
  userAgent: z.string().trim().min(1, "userAgent is required (SEC asks for a contact string)"),
  archiveBaseUrl: z.string().url().default("https://www.sec.gov/Archives"),
  statePath: z.string().min(1).default("state.json"),
  ledgerPath: z.string().min(1).default("filings.ndjson"),
  historyDays: z.number().int().positive().default(90),
  maxHistoryRows: z.number().int().positive().default(50_000),
  maxLiveIds: z.number().int().positive().default(500),
  maxLiveProcessPerRun: z.number().int().min(0).default(20),
  bootstrapStrategy: z.enum(["quarterly", "daily"]).default("quarterly"),
  requestDelayMs: z.number().int().min(0).default(250),
  liveDedupPolicy: z
    .enum(["mark-seen-before-fetch", "mark-seen-after-success"])
    .default("mark-seen-before-fetch"),
  http: HttpSchema.default({}),
  alert: AlertRuleSchema.default({}),
  notification: NotificationSchema.default({})
});

export type MonitorConfig = z.infer<typeof ConfigSchema>;
export type AlertRule = MonitorConfig["alert"];
export type NotificationConfig = MonitorConfig["notification"];
export type BootstrapStrategy = MonitorConfig["bootstrapStrategy"];
export type LiveDedupPolicy = MonitorConfig["liveDedupPolicy"];

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues.map((item) => `${item.path.join(".")}: ${item.message}`).join(", ");
    throw new ConfigError(`Invalid env: ${issue}`);
  }
  return parsed.data;
}

export function parseConfig(raw: unknown, env: Env): MonitorConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues
      .map((item) => `${item.path.join(".") || "config"}: ${item.message}`)
      .join(", ");
    throw new ConfigError(`Invalid config: ${issue}`);
  }

  const notification = parsed.data.notification;
  if (notification.enabled) {
    const missing = [
      notification.host ? null : "notification.host",
      notification.from ? null : "notification.from",
      notification.to.length ? null : "notification.to",
      env.SMTP_PASSWORD ? null : "SMTP_PASSWORD"
    ].filter((item): item is string => item !== null);
    if (missing.length) {
      throw new ConfigError(`Notification enabled but missing: ${missing.join(", ")}`);
    }
  }
  return parsed.data;
}

/** Relative state/ledger paths resolve against the config file's directory. */
export async function loadConfig(configPath: string, env: Env): Promise<MonitorConfig> {
  let raw: unknown;
  try {
    raw = await readJsonIfExists(configPath, undefined);
  } catch (error) {
    throw new ConfigError(errorMessage(error));
  }
  if (raw === undefined) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  const config = parseConfig(raw, env);
  const baseDir = path.dirname(path.resolve(configPath));
  return {
    ...config,
    statePath: path.resolve(baseDir, config.statePath),
    ledgerPath: path.resolve(baseDir, config.ledgerPath)
  };
}

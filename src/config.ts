import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { getExtractor } from "./sites/index.js";
import type { Config } from "./types.js";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const siteSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().url(),
  fetch_mode: z.enum(["static", "dynamic"]),
  extractor: z.string().min(1),
  active: z.boolean().default(true),
});

const configSchema = z.object({
  ledger_path: z.string().min(1).default("data/seen-postings.json"),
  timeout_ms: z.number().int().positive().default(30_000),
  fetch_retries: z.number().int().min(0).max(5).default(0),
  delay_ms: z.number().int().min(0).default(2_000),
  user_agent: z.string().min(1).default(DEFAULT_USER_AGENT),
  retention_days: z.number().int().min(0).default(30),
  skip_expired: z.boolean().default(true),
  keywords_include: z.array(z.string()).default([]),
  keywords_exclude: z.array(z.string()).default([]),
  notification_email: z.string().default(""),
  sites: z.array(siteSchema).min(1),
});

export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config: ${issues}`);
  }

  const config = result.data;
  const names = new Set<string>();
  for (const site of config.sites) {
    if (!getExtractor(site.extractor)) {
      throw new ConfigError(`Site "${site.name}" references unknown extractor "${site.extractor}"`);
    }
    if (names.has(site.name)) {
      throw new ConfigError(`Duplicate site name "${site.name}"`);
    }
    names.add(site.name);
  }

  return config;
}

/**
 * Read and validate the config file. Relative paths inside it (the ledger)
 * resolve against the config file's directory. `LEDGER_PATH` overrides the
 * ledger location and `NOTIFICATION_EMAIL` the recipient.
 */
export function loadConfig(configPath: string): Config {
  const absolute = path.resolve(configPath);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absolute, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read ${absolute}: ${errorMessage(error)}`, { cause: error });
  }

  const config = parseConfig(raw);
  const ledgerPath = process.env.LEDGER_PATH || config.ledger_path;

  return {
    ...config,
    ledger_path: path.resolve(path.dirname(absolute), ledgerPath),
    notification_email: process.env.NOTIFICATION_EMAIL || config.notification_email,
  };
}

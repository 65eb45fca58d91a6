import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import { BooleanEnvSchema, ConfigSchema } from "../../adapters/validation.js";
import {
  Config,
  LoggingConfig,
} from "../../core/domain/entities/config.entity.js";
import { IEventLogStore } from "../../core/domain/repositories/event-log-store.repository.js";
import { SqliteEventLogRepository } from "../database/sqlite-event-log.repository.js";
import { JsonLinesEventLogStore } from "../services/jsonl-event-log-store.service.js";

export function getConfigPath(): string {
  return (
    process.env.CONFIG_PATH ?? resolve(process.cwd(), "config", "config.yaml")
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function substituteEnv(value: unknown): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return process.env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map(substituteEnv);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v);
    return out;
  }
  return value;
}

/** Env vars win over the YAML file. Unset or blank vars are ignored. */
function applyEnvOverrides(parsed: Record<string, unknown>): void {
  const section = (name: string): Record<string, unknown> => {
    const current = parsed[name];
    if (isRecord(current)) return current;
    const created: Record<string, unknown> = {};
    parsed[name] = created;
    return created;
  };
  const env = (key: string): string | undefined => {
    const v = process.env[key]?.trim();
    return v ? v : undefined;
  };

  const downloadDir = env("DOWNLOAD_DIR");
  if (downloadDir) section("download").downloadDir = downloadDir;
  const storageDir = env("STORAGE_DIR");
  if (storageDir) section("download").storageDir = storageDir;
  const maxWait = env("DOWNLOAD_MAX_WAIT_SECONDS");
  if (maxWait) section("download").maxWaitSeconds = maxWait;

  const headless = env("BROWSER_HEADLESS");
  if (headless) {
    const flag = BooleanEnvSchema.safeParse(headless.toLowerCase());
    if (!flag.success) {
      throw new Error(`BROWSER_HEADLESS must be true or false, got "${headless}".`);
    }
    section("browser").headless = flag.data;
  }
  const executablePath = env("CHROME_EXECUTABLE_PATH");
  if (executablePath) section("browser").executablePath = executablePath;
}

export function loadConfig(configPath: string = getConfigPath()): Config {
  loadEnv();

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Failed to load config from ${configPath}. ${msg}`, { cause: e });
  }
  let parsed: unknown;
  try {
    parsed = yaml.load(raw) ?? {};
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Invalid YAML in ${configPath}. ${msg}`, { cause: e });
  }
  const withEnv = substituteEnv(parsed);
  if (!isRecord(withEnv)) {
    throw new Error(`Config at ${configPath} must be a YAML object.`);
  }
  applyEnvOverrides(withEnv);

  const result = ConfigSchema.safeParse(withEnv);
  if (!result.success) {
    const invalid = result.error.issues
      .map((i) => `${i.path.join(".")} (${i.message})`)
      .join(", ");
    throw new Error(`Invalid config at ${configPath}. Missing or invalid: ${invalid}.`);
  }
  return result.data;
}

/** SQLite when `eventLogDb` is set, else JSON lines, else no persistence. */
export function createEventLogStore(
  logging: LoggingConfig,
): IEventLogStore | undefined {
  if (logging.eventLogDb) return new SqliteEventLogRepository(logging.eventLogDb);
  if (logging.eventLogJsonl) return new JsonLinesEventLogStore(logging.eventLogJsonl);
  return undefined;
}

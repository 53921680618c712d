/**
 * Service settings.
 *
 * Sources, later ones win: built-in defaults, an optional YAML settings file
 * (`netval.config.yml` in the working directory, or the path in
 * NETVAL_CONFIG), then NETVAL_* environment variables. The merged result is
 * checked against schema/settings.schema.json.
 */

import * as path from "path";
import * as YAML from "yaml";

import settingsSchema from "../../schema/settings.schema.json";
import type { LogLevel } from "../logging/loggerUtils";
import { SettingsError } from "../shared/errors";
import { nodeFsAdapter } from "../shared/io/NodeFsAdapter";
import type { FileSystemAdapter } from "../shared/io/types";
import { collectSchemaErrors, compileSchema } from "../shared/utilities/schemaValidation";

export interface Settings {
  appName: string;
  host: string;
  port: number;
  /** Directory holding the project documents */
  dataDir: string;
  logLevel: LogLevel;
  /** Origins allowed by CORS */
  corsOrigins: string[];
}

export const SETTINGS_FILE_NAME = "netval.config.yml";
export const DEFAULT_PORT = 8742;

const validateSettings = compileSchema<Settings>(settingsSchema);

/** Environment variable for each setting. */
const ENV_KEYS = {
  appName: "NETVAL_APP_NAME",
  host: "NETVAL_HOST",
  port: "NETVAL_PORT",
  dataDir: "NETVAL_DATA_DIR",
  logLevel: "NETVAL_LOG_LEVEL",
  corsOrigins: "NETVAL_CORS_ORIGINS"
} as const satisfies Record<keyof Settings, string>;

export function defaultSettings(cwd: string): Settings {
  return {
    appName: "NetVal Backend",
    host: "127.0.0.1",
    port: DEFAULT_PORT,
    dataDir: path.join(cwd, "data"),
    logLevel: "info",
    corsOrigins: ["http://localhost:5173", "app://netval"]
  };
}

export interface LoadSettingsOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  fs?: FileSystemAdapter;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readSettingsFile(filePath: string, fs: FileSystemAdapter): Promise<Record<string, unknown>> {
  if (!(await fs.exists(filePath))) return {};

  const parsed: unknown = YAML.parse(await fs.readFile(filePath));
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new SettingsError([`${filePath}: settings file must be a YAML map`]);
  }
  return parsed;
}

function readEnvironment(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.trim() === "") continue;

    switch (key) {
      case "port":
        overrides[key] = Number(raw);
        break;
      case "corsOrigins":
        overrides[key] = raw
          .split(",")
          .map((origin) => origin.trim())
          .filter((origin) => origin.length > 0);
        break;
      case "logLevel":
        overrides[key] = raw.trim().toLowerCase();
        break;
      default:
        overrides[key] = raw.trim();
    }
  }
  return overrides;
}

/**
 * Load and validate settings.
 * @throws SettingsError listing every invalid value
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const fs = options.fs ?? nodeFsAdapter;

  const filePath = env["NETVAL_CONFIG"] ? path.resolve(cwd, env["NETVAL_CONFIG"]) : path.join(cwd, SETTINGS_FILE_NAME);
  const merged: Record<string, unknown> = {
    ...defaultSettings(cwd),
    ...(await readSettingsFile(filePath, fs)),
    ...readEnvironment(env)
  };

  if (typeof merged["dataDir"] === "string") {
    merged["dataDir"] = path.resolve(cwd, merged["dataDir"]);
  }

  if (!validateSettings(merged)) {
    throw new SettingsError(collectSchemaErrors(validateSettings.errors));
  }
  return merged;
}

import fs from "node:fs/promises";
import yaml from "js-yaml";
import { ZodError } from "zod";
import { ConfigError } from "../../core/errors";
import { relayConfigSchema, type RelayConfig } from "./schema";

type Env = Record<string, string | undefined>;

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep merge; arrays and scalars from `override` replace those in `base`. */
export function mergeConfig(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(value) ? mergeConfig(isPlainObject(current) ? current : {}, value) : value;
  }
  return result;
}

function toNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`, [name]);
  }
  return value;
}

/**
 * Environment overrides. Only variables that are set end up in the result,
 * so unset ones never mask values from the config file.
 */
export function configFromEnv(env: Env): PlainObject {
  const layer: PlainObject = {
    transport: {
      socketPath: env.FRAME_RELAY_SOCKET || undefined,
      port: toNumber("FRAME_RELAY_PORT", env.FRAME_RELAY_PORT),
      capacity: toNumber("FRAME_RELAY_CAPACITY", env.FRAME_RELAY_CAPACITY),
    },
    camera: {
      driver: env.FRAME_RELAY_CAMERA || undefined,
    },
    display: {
      stopKey: env.FRAME_RELAY_STOP_KEY || undefined,
    },
    processing: {
      drainPolicy: env.FRAME_RELAY_DRAIN_POLICY || undefined,
    },
    output: {
      dir: env.FRAME_RELAY_OUTPUT_DIR || undefined,
    },
    log: {
      level: env.LOG_LEVEL || undefined,
      format: env.LOG_FORMAT || undefined,
    },
  };
  return mergeConfig({}, layer);
}

export async function readConfigFile(filePath: string): Promise<PlainObject> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (e) {
    throw new ConfigError(`Cannot read config file ${filePath}`, [], { cause: e });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (e) {
    throw new ConfigError(`Invalid YAML in config file ${filePath}`, [], { cause: e });
  }

  if (parsed === undefined || parsed === null) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`);
  }
  return parsed;
}

export function parseConfig(raw: unknown): RelayConfig {
  try {
    return relayConfigSchema.parse(raw);
  } catch (e) {
    if (e instanceof ZodError) {
      const issues = e.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
      throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues, { cause: e });
    }
    throw e;
  }
}

export interface LoadConfigOptions {
  file?: string;
  env?: Env;
}

/** defaults ← YAML file ← environment */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RelayConfig> {
  const env = options.env ?? process.env;
  const file = options.file ?? (env.FRAME_RELAY_CONFIG || undefined);
  const fromFile = file ? await readConfigFile(file) : {};
  return parseConfig(mergeConfig(fromFile, configFromEnv(env)));
}

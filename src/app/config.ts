/**
 * Load git-retcon configuration
 *
 * Precedence: explicit overrides, then RETCON_* environment variables,
 * then `.retcon.yml`, then defaults.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import type { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { type Config, type ConfigFile, ConfigFileSchema, ConfigSchema, HostKeyCheckingSchema } from "./schema.js";
import { isNotFound } from "../lib/fs.js";

export const CONFIG_FILE = ".retcon.yml";

export const DEFAULT_CONFIG: Config = {
  committer: { name: "Retcon", email: "retcon@localhost" },
  lease: true,
  reuseUnchanged: true,
  strictHostKeyChecking: "accept-new",
};

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit file; unlike the default file it must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigFile;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const { cwd = process.cwd(), configPath, env = process.env, overrides = {} } = options;

  const file = await readConfigFile(configPath ? resolve(cwd, configPath) : resolve(cwd, CONFIG_FILE), !configPath);
  const fromEnv = configFromEnv(env);

  // Highest precedence first
  const layers = [overrides, fromEnv, file];
  const merged = {
    committer: {
      name: firstDefined(layers.map((layer) => layer.committer?.name)) ?? DEFAULT_CONFIG.committer.name,
      email: firstDefined(layers.map((layer) => layer.committer?.email)) ?? DEFAULT_CONFIG.committer.email,
    },
    cacheDir: firstDefined(layers.map((layer) => layer.cacheDir)),
    lease: firstDefined(layers.map((layer) => layer.lease)) ?? DEFAULT_CONFIG.lease,
    reuseUnchanged: firstDefined(layers.map((layer) => layer.reuseUnchanged)) ?? DEFAULT_CONFIG.reuseUnchanged,
    strictHostKeyChecking: firstDefined(layers.map((layer) => layer.strictHostKeyChecking)) ??
      DEFAULT_CONFIG.strictHostKeyChecking,
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError("Invalid configuration", formatIssues(result.error));
  }
  return result.data;
}

async function readConfigFile(path: string, optional: boolean): Promise<ConfigFile> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (optional && isNotFound(error)) {
      return {};
    }
    throw new ConfigError(`Cannot read ${path}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${path}: ${errorMessage(error)}`);
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${path}`, formatIssues(result.error));
  }
  return result.data;
}

function configFromEnv(env: NodeJS.ProcessEnv): ConfigFile {
  const lease = parseBoolean(env.RETCON_LEASE, "RETCON_LEASE");
  const strictHostKeyChecking = env.RETCON_STRICT_HOST_KEY_CHECKING;

  const fromEnv: ConfigFile = {
    committer: {
      name: env.RETCON_COMMITTER_NAME || undefined,
      email: env.RETCON_COMMITTER_EMAIL || undefined,
    },
    cacheDir: env.RETCON_CACHE_DIR || undefined,
    lease,
  };

  if (strictHostKeyChecking) {
    const checked = HostKeyCheckingSchema.safeParse(strictHostKeyChecking);
    if (!checked.success) {
      throw new ConfigError("Invalid RETCON_STRICT_HOST_KEY_CHECKING", formatIssues(checked.error));
    }
    fromEnv.strictHostKeyChecking = checked.data;
  }
  return fromEnv;
}

function parseBoolean(value: string | undefined, name: string): boolean | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  if (/^(1|true|yes|on)$/i.test(value)) {
    return true;
  }
  if (/^(0|false|no|off)$/i.test(value)) {
    return false;
  }
  throw new ConfigError(`${name} must be a boolean, got "${value}"`);
}

function firstDefined<T>(values: (T | undefined)[]): T | undefined {
  return values.find((value) => value !== undefined);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

import { readFileSync } from "node:fs";
import type { z } from "zod";
import { ConfigError } from "../errors.js";
import type { Logger } from "../logger.js";

export const DEFAULT_CONFIG_ENV_VAR = "INTEGRATION_TESTING_CONFIG";

export interface LoadConfigOptions {
  /** Path of the JSON file read when the environment variable is unset or empty. */
  filePath: string;
  /** Default: INTEGRATION_TESTING_CONFIG */
  envVar?: string;
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

function readRawConfig(options: LoadConfigOptions): { text: string; source: string } {
  const envVar = options.envVar ?? DEFAULT_CONFIG_ENV_VAR;
  const env = options.env ?? process.env;
  const fromEnv = env[envVar];
  if (fromEnv && fromEnv.length > 0) {
    return { text: fromEnv, source: `env:${envVar}` };
  }

  options.logger?.debug(
    { envVar, filePath: options.filePath },
    "No JSON config in environment, reading config file",
  );
  try {
    return { text: readFileSync(options.filePath, "utf8"), source: options.filePath };
  } catch (err) {
    throw new ConfigError(
      `No configuration found: set ${envVar} or create ${options.filePath}`,
      options.filePath,
      { cause: err },
    );
  }
}

/**
 * Read a JSON configuration from the environment (preferred) or a file and
 * validate it against `schema`.
 */
export function loadJsonConfig<S extends z.ZodTypeAny>(
  schema: S,
  options: LoadConfigOptions,
): z.output<S> {
  const { text, source } = readRawConfig(options);

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Configuration from ${source} is not valid JSON`, source, { cause: err });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration from ${source}: ${issues}`, source);
  }
  return parsed.data;
}

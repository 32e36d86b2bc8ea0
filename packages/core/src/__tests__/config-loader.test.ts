import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { IntegrationConfigSchema } from "@testbed/schemas";
import { loadJsonConfig, DEFAULT_CONFIG_ENV_VAR } from "../config/loader.js";
import { ConfigError } from "../errors.js";
import { uniqueName } from "../utils/naming.js";
import { makeLogger } from "./helpers.js";

const VALID = {
  apiBaseUrl: "https://api.content.test/2.0",
  appSettings: { clientId: "test-client", clientSecret: "test-secret" },
  enterpriseId: "ent_1",
};

describe("loadJsonConfig", () => {
  let dir: string;
  let filePath: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "testbed-config-"));
    filePath = join(dir, "config.json");
    writeFileSync(filePath, JSON.stringify({ ...VALID, userID: "usr_from_file" }));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("prefers the environment variable", () => {
    const config = loadJsonConfig(IntegrationConfigSchema, {
      filePath,
      env: { [DEFAULT_CONFIG_ENV_VAR]: JSON.stringify({ ...VALID, userID: "usr_from_env" }) },
    });

    expect(config.userID).toBe("usr_from_env");
  });

  it("reads the file when the environment variable is empty", () => {
    const logger = makeLogger();
    const config = loadJsonConfig(IntegrationConfigSchema, {
      filePath,
      env: { [DEFAULT_CONFIG_ENV_VAR]: "" },
      logger,
    });

    expect(config.userID).toBe("usr_from_file");
    expect(logger.debug).toHaveBeenCalledWith(
      { envVar: DEFAULT_CONFIG_ENV_VAR, filePath },
      "No JSON config in environment, reading config file",
    );
  });

  it("honours a custom variable name", () => {
    const config = loadJsonConfig(IntegrationConfigSchema, {
      filePath: join(dir, "missing.json"),
      envVar: "CONTENT_CONFIG",
      env: { CONTENT_CONFIG: JSON.stringify(VALID) },
    });

    expect(config.enterpriseId).toBe("ent_1");
    expect(config.userID).toBeUndefined();
  });

  it("reports a missing file", () => {
    const missing = join(dir, "missing.json");
    expect(() => loadJsonConfig(IntegrationConfigSchema, { filePath: missing, env: {} })).toThrow(
      `No configuration found: set ${DEFAULT_CONFIG_ENV_VAR} or create ${missing}`,
    );
  });

  it("reports invalid JSON", () => {
    expect(() =>
      loadJsonConfig(IntegrationConfigSchema, {
        filePath,
        env: { [DEFAULT_CONFIG_ENV_VAR]: "{not json" },
      }),
    ).toThrow(`Configuration from env:${DEFAULT_CONFIG_ENV_VAR} is not valid JSON`);
  });

  it("lists schema violations by path", () => {
    const { enterpriseId: _omit, ...withoutEnterprise } = VALID;
    let caught: unknown = null;
    try {
      loadJsonConfig(IntegrationConfigSchema, {
        filePath,
        env: { [DEFAULT_CONFIG_ENV_VAR]: JSON.stringify(withoutEnterprise) },
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      source: `env:${DEFAULT_CONFIG_ENV_VAR}`,
      message: `Invalid configuration from env:${DEFAULT_CONFIG_ENV_VAR}: enterpriseId: Required`,
    });
  });
});

describe("uniqueName", () => {
  it("appends a uuid to the label", () => {
    expect(uniqueName("folder")).toMatch(
      /^folder - [0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("never repeats across calls", () => {
    const names = new Set(Array.from({ length: 50 }, () => uniqueName("file")));
    expect(names.size).toBe(50);
  });
});

import { describe, it, expect } from "vitest";
import {
  AccessLevelSchema,
  CommandScopeSchema,
  LifecycleStateSchema,
  IntegrationConfigSchema,
  ContentFileSchema,
  RetentionPolicySchema,
  DEFAULT_ACCESS_LEVEL,
  DEFAULT_COMMAND_SCOPE,
} from "../index.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function baseConfig(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    apiBaseUrl: "https://api.content.test/2.0",
    appSettings: { clientId: "test-client", clientSecret: "test-secret" },
    enterpriseId: "ent_1",
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// 1. Command enums
// ---------------------------------------------------------------------------
describe("command enums", () => {
  it("accepts both access levels", () => {
    expect(AccessLevelSchema.safeParse("admin").success).toBe(true);
    expect(AccessLevelSchema.safeParse("user").success).toBe(true);
  });

  it("rejects an unknown access level", () => {
    expect(AccessLevelSchema.safeParse("owner").success).toBe(false);
  });

  it("accepts both scopes and rejects run scope", () => {
    expect(CommandScopeSchema.options).toEqual(["test", "class"]);
    expect(CommandScopeSchema.safeParse("run").success).toBe(false);
  });

  it("defaults to user access and test scope", () => {
    expect(DEFAULT_ACCESS_LEVEL).toBe("user");
    expect(DEFAULT_COMMAND_SCOPE).toBe("test");
  });

  it("lists lifecycle states in nesting order", () => {
    expect(LifecycleStateSchema.options).toEqual([
      "uninitialized",
      "run-active",
      "class-active",
      "test-active",
      "torn-down",
    ]);
  });
});

// ---------------------------------------------------------------------------
// 2. IntegrationConfigSchema
// ---------------------------------------------------------------------------
describe("IntegrationConfigSchema", () => {
  it("accepts a config without userID", () => {
    const result = IntegrationConfigSchema.safeParse(baseConfig());
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.userID).toBeUndefined();
      expect(result.data.enterpriseId).toBe("ent_1");
    }
  });

  it("keeps a non-empty userID", () => {
    const result = IntegrationConfigSchema.parse(baseConfig({ userID: "usr_42" }));
    expect(result.userID).toBe("usr_42");
  });

  it("treats an empty userID as absent", () => {
    const result = IntegrationConfigSchema.parse(baseConfig({ userID: "" }));
    expect(result.userID).toBeUndefined();
  });

  it("rejects missing app settings", () => {
    const result = IntegrationConfigSchema.safeParse(baseConfig({ appSettings: undefined }));
    expect(result.success).toBe(false);
  });

  it("rejects an empty client secret", () => {
    const result = IntegrationConfigSchema.safeParse(
      baseConfig({ appSettings: { clientId: "test-client", clientSecret: "" } }),
    );
    expect(result.success).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// 3. Content resources
// ---------------------------------------------------------------------------
describe("content resources", () => {
  it("accepts a file", () => {
    const result = ContentFileSchema.safeParse({
      id: "file_1",
      type: "file",
      name: "file - abc",
      parentId: "0",
      ownerId: "usr_1",
      size: 12,
      sha1: "0".repeat(40),
    });
    expect(result.success).toBe(true);
  });

  it("rejects a file with a negative size", () => {
    const result = ContentFileSchema.safeParse({
      id: "file_1",
      type: "file",
      name: "file - abc",
      parentId: "0",
      ownerId: "usr_1",
      size: -1,
      sha1: "",
    });
    expect(result.success).toBe(false);
  });

  it("accepts a retired indefinite policy", () => {
    const result = RetentionPolicySchema.safeParse({
      id: "rp_1",
      type: "retention_policy",
      name: "policy - abc",
      policyType: "indefinite",
      retentionLengthDays: null,
      dispositionAction: "remove_retention",
      status: "retired",
    });
    expect(result.success).toBe(true);
  });
});

import { describe, it, expect, vi, beforeEach } from "vitest";
import { readFileSync } from "node:fs";
import type { Logger } from "@testbed/core";
import { bootstrapContentLifecycle } from "../bootstrap.js";
import type { ContentLifecycle } from "../bootstrap.js";
import { InMemoryContentService } from "../providers/in-memory.js";

const CONFIG = JSON.stringify({
  apiBaseUrl: "memory://content",
  appSettings: { clientId: "test-client", clientSecret: "test-secret" },
  enterpriseId: "ent_1",
});

function makeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("ContentFixtures", () => {
  let service: InMemoryContentService;
  let lifecycle: ContentLifecycle;

  beforeEach(async () => {
    service = new InMemoryContentService();
    lifecycle = bootstrapContentLifecycle({
      configPath: "/nonexistent/config.json",
      env: { INTEGRATION_TESTING_CONFIG: CONFIG },
      logger: makeLogger(),
      service,
    });
    await lifecycle.controller.startRun();
    lifecycle.controller.startClass();
    lifecycle.controller.startTest();
  });

  it("runs the whole lifecycle against the in-memory service", async () => {
    const { controller, fixtures } = lifecycle;
    const userId = controller.session.userId;
    expect(service.hasUser(userId)).toBe(true);

    const classFolder = await fixtures.createFolder("0", "class");
    const file = await fixtures.createSmallFile(classFolder.id);
    const policy = await fixtures.createRetentionPolicy(classFolder.id);

    expect(classFolder.name).toMatch(/^folder - /);
    expect(file).toMatchObject({ parentId: classFolder.id, ownerId: userId, size: 48 });
    expect(file.name).toMatch(/^file - /);
    expect(policy.name).toMatch(/^policy - /);

    await controller.endTest();
    expect(service.listFiles()).toEqual([]);
    expect(service.listPolicies().map((p) => p.status)).toEqual(["retired"]);
    expect(service.listFolders().map((f) => f.id)).toEqual([classFolder.id]);

    await controller.endClass();
    expect(service.listFolders()).toEqual([]);

    await controller.endRun();
    expect(service.hasUser(userId)).toBe(false);
    expect(controller.state).toBe("torn-down");
  });

  it("creates admin-owned resources through the admin client", async () => {
    const { controller, fixtures } = lifecycle;

    const folder = await fixtures.createFolderAsAdmin();
    const file = await fixtures.createSmallFileAsAdmin(folder.id);

    expect(folder.ownerId).toBe("ent_1");
    expect(file.ownerId).toBe("ent_1");
    expect(controller.pending("test").map((c) => c.accessLevel)).toEqual(["admin", "admin"]);
  });

  it("deletes files without tracking the deletion", async () => {
    const { controller, fixtures } = lifecycle;
    const file = await fixtures.createSmallFile("0", "class");

    await fixtures.deleteFile(file.id);

    expect(service.listFiles()).toEqual([]);
    expect(controller.pending("test")).toEqual([]);
    // The class-scoped upload is still tracked and will fail to dispose
    await controller.endTest();
    await expect(controller.endClass()).rejects.toThrow(`No such file: '${file.id}'`);
    expect(controller.leakedCommands()).toHaveLength(1);
  });

  it("exposes the bundled fixtures and random buffers", () => {
    const { fixtures } = lifecycle;

    expect(readFileSync(fixtures.smallFilePath(), "utf8")).toBe(
      "Small test file used by the integration suites.\n",
    );
    expect(readFileSync(fixtures.smallFileV2Path(), "utf8")).toBe(
      "Small test file used by the integration suites, second version.\n",
    );
    const big = fixtures.createBigFileBuffer(1024);
    expect(big).toHaveLength(1024);
    expect(big.equals(fixtures.createBigFileBuffer(1024))).toBe(false);
  });
});

import { describe, it, expect } from "vitest";
import { readFile } from "node:fs/promises";
import { uniqueName } from "@testbed/core";
import { ContentNotFoundError } from "@testbed/content-cloud";
import { useClassScope, useContentLifecycle } from "../setup.js";

const { controller, fixtures } = useContentLifecycle();

describe("files", () => {
  useClassScope(controller);

  let uploadedId = "";

  it("uploads the small fixture as the test user", async () => {
    const file = await fixtures.createSmallFile();
    const expected = await readFile(fixtures.smallFilePath());

    const fetched = await controller.session.userClient.getFile(file.id);

    expect(fetched.size).toBe(expected.byteLength);
    expect(fetched.ownerId).toBe(controller.session.userId);
    uploadedId = file.id;
  });

  it("removes test-scoped uploads once the test ends", async () => {
    await expect(controller.session.adminClient.getFile(uploadedId)).rejects.toBeInstanceOf(
      ContentNotFoundError,
    );
  });

  it("uploads as the enterprise account when asked", async () => {
    const folder = await fixtures.createFolderAsAdmin();
    const file = await fixtures.createSmallFileAsAdmin(folder.id);

    expect(file.parentId).toBe(folder.id);
    expect(file.ownerId).toBe(controller.session.adminClient.subject.id);
  });

  it("deletes an untracked upload immediately", async () => {
    const content = fixtures.createBigFileBuffer(64 * 1024);
    const file = await controller.session.userClient.uploadFile({
      name: uniqueName("big file"),
      parentId: "0",
      content,
    });
    expect(file.size).toBe(64 * 1024);

    await fixtures.deleteFile(file.id);

    await expect(controller.session.userClient.getFile(file.id)).rejects.toBeInstanceOf(
      ContentNotFoundError,
    );
    expect(controller.pending("test")).toEqual([]);
  });
});

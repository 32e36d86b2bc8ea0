import { randomBytes } from "node:crypto";
import { fileURLToPath } from "node:url";
import type {
  AccessLevel,
  CommandScope,
  ContentFile,
  ContentFolder,
  IntegrationConfig,
  RetentionPolicy,
} from "@testbed/schemas";
import type { LifecycleController } from "@testbed/core";
import { uniqueName } from "@testbed/core";
import type { ContentClient } from "../providers/content-client.js";
import { ROOT_FOLDER_ID } from "../providers/content-client.js";
import { CreateFileCommand } from "../commands/create-file.js";
import { CreateFolderCommand } from "../commands/create-folder.js";
import { CreateRetentionPolicyCommand } from "../commands/create-retention-policy.js";
import { DeleteFileCommand } from "../commands/delete-file.js";

const SMALL_FILE = new URL("../../test-data/small-test.txt", import.meta.url);
const SMALL_FILE_V2 = new URL("../../test-data/small-test-v2.txt", import.meta.url);

export type ContentController = LifecycleController<ContentClient, IntegrationConfig>;

/**
 * One-call resource creation for test bodies. Everything created here is
 * tracked by the controller and removed when its scope ends.
 */
export class ContentFixtures {
  constructor(private readonly controller: ContentController) {}

  async createSmallFile(
    parentId: string = ROOT_FOLDER_ID,
    scope: CommandScope = "test",
    accessLevel: AccessLevel = "user",
  ): Promise<ContentFile> {
    const command = new CreateFileCommand(
      uniqueName("file"),
      this.smallFilePath(),
      parentId,
      scope,
      accessLevel,
    );
    await this.controller.execute(command);
    return command.file;
  }

  createSmallFileAsAdmin(parentId: string = ROOT_FOLDER_ID): Promise<ContentFile> {
    return this.createSmallFile(parentId, "test", "admin");
  }

  async deleteFile(fileId: string, accessLevel: AccessLevel = "user"): Promise<void> {
    await this.controller.execute(new DeleteFileCommand(fileId, accessLevel));
  }

  async createFolder(
    parentId: string = ROOT_FOLDER_ID,
    scope: CommandScope = "test",
    accessLevel: AccessLevel = "user",
  ): Promise<ContentFolder> {
    const command = new CreateFolderCommand(uniqueName("folder"), parentId, scope, accessLevel);
    await this.controller.execute(command);
    return command.folder;
  }

  createFolderAsAdmin(parentId: string = ROOT_FOLDER_ID): Promise<ContentFolder> {
    return this.createFolder(parentId, "test", "admin");
  }

  async createRetentionPolicy(
    folderId: string = ROOT_FOLDER_ID,
    scope: CommandScope = "test",
  ): Promise<RetentionPolicy> {
    const command = new CreateRetentionPolicyCommand(uniqueName("policy"), folderId, scope);
    await this.controller.execute(command);
    return command.policy;
  }

  smallFilePath(): string {
    return fileURLToPath(SMALL_FILE);
  }

  smallFileV2Path(): string {
    return fileURLToPath(SMALL_FILE_V2);
  }

  createBigFileBuffer(size: number): Buffer {
    return randomBytes(size);
  }
}

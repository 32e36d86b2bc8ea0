import { readFile } from "node:fs/promises";
import type { AccessLevel, CommandScope, ContentFile } from "@testbed/schemas";
import type { DisposableCommand } from "@testbed/core";
import type { ContentClient } from "../providers/content-client.js";
import { ROOT_FOLDER_ID } from "../providers/content-client.js";
import { requireExecuted } from "./executed.js";

/** Uploads a local file; disposal deletes it. */
export class CreateFileCommand implements DisposableCommand<ContentClient> {
  readonly scope: CommandScope;
  readonly accessLevel: AccessLevel;
  private created: ContentFile | null = null;

  constructor(
    readonly fileName: string,
    readonly filePath: string,
    readonly parentId: string = ROOT_FOLDER_ID,
    scope: CommandScope = "test",
    accessLevel: AccessLevel = "user",
  ) {
    this.scope = scope;
    this.accessLevel = accessLevel;
  }

  get file(): ContentFile {
    return requireExecuted(this.created, "CreateFileCommand");
  }

  async execute(client: ContentClient): Promise<string> {
    const content = await readFile(this.filePath);
    this.created = await client.uploadFile({
      name: this.fileName,
      parentId: this.parentId,
      content,
    });
    return this.created.id;
  }

  async dispose(client: ContentClient): Promise<void> {
    await client.deleteFile(this.file.id);
  }
}

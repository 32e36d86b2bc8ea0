import type { AccessLevel, CommandScope, ContentFolder } from "@testbed/schemas";
import type { DisposableCommand } from "@testbed/core";
import type { ContentClient } from "../providers/content-client.js";
import { ROOT_FOLDER_ID } from "../providers/content-client.js";
import { requireExecuted } from "./executed.js";

/** Creates a folder; disposal deletes it with everything still inside. */
export class CreateFolderCommand implements DisposableCommand<ContentClient> {
  readonly scope: CommandScope;
  readonly accessLevel: AccessLevel;
  private created: ContentFolder | null = null;

  constructor(
    readonly folderName: string,
    readonly parentId: string = ROOT_FOLDER_ID,
    scope: CommandScope = "test",
    accessLevel: AccessLevel = "user",
  ) {
    this.scope = scope;
    this.accessLevel = accessLevel;
  }

  get folder(): ContentFolder {
    return requireExecuted(this.created, "CreateFolderCommand");
  }

  async execute(client: ContentClient): Promise<string> {
    this.created = await client.createFolder({ name: this.folderName, parentId: this.parentId });
    return this.created.id;
  }

  async dispose(client: ContentClient): Promise<void> {
    await client.deleteFolder(this.folder.id, { recursive: true });
  }
}

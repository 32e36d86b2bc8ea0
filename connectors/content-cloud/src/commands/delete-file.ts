import type { AccessLevel } from "@testbed/schemas";
import type { Command } from "@testbed/core";
import type { ContentClient } from "../providers/content-client.js";

/** Deletes a file. Not reversible, so never tracked for cleanup. */
export class DeleteFileCommand implements Command<ContentClient> {
  readonly accessLevel: AccessLevel;

  constructor(
    readonly fileId: string,
    accessLevel: AccessLevel = "user",
  ) {
    this.accessLevel = accessLevel;
  }

  async execute(client: ContentClient): Promise<string> {
    await client.deleteFile(this.fileId);
    return this.fileId;
  }
}

import type {
  AccessLevel,
  CommandScope,
  RetentionPolicy,
  RetentionPolicyAssignment,
} from "@testbed/schemas";
import type { DisposableCommand } from "@testbed/core";
import type { ContentClient } from "../providers/content-client.js";
import { ROOT_FOLDER_ID } from "../providers/content-client.js";
import { requireExecuted } from "./executed.js";

const RETENTION_LENGTH_DAYS = 1;

/**
 * Creates a one-day retention policy and assigns it to a folder. Policies
 * cannot be deleted, so disposal retires it.
 */
export class CreateRetentionPolicyCommand implements DisposableCommand<ContentClient> {
  readonly scope: CommandScope;
  readonly accessLevel: AccessLevel = "admin";
  private created: RetentionPolicy | null = null;
  private createdAssignment: RetentionPolicyAssignment | null = null;

  constructor(
    readonly policyName: string,
    readonly folderId: string = ROOT_FOLDER_ID,
    scope: CommandScope = "test",
  ) {
    this.scope = scope;
  }

  get policy(): RetentionPolicy {
    return requireExecuted(this.created, "CreateRetentionPolicyCommand");
  }

  get assignment(): RetentionPolicyAssignment {
    return requireExecuted(this.createdAssignment, "CreateRetentionPolicyCommand");
  }

  async execute(client: ContentClient): Promise<string> {
    const policy = await client.createRetentionPolicy({
      name: this.policyName,
      policyType: "finite",
      retentionLengthDays: RETENTION_LENGTH_DAYS,
      dispositionAction: "remove_retention",
    });

    try {
      this.createdAssignment = await client.assignRetentionPolicy(policy.id, this.folderId);
    } catch (err) {
      // Not tracked yet, so nothing else would retire it
      await client.retireRetentionPolicy(policy.id);
      throw err;
    }

    this.created = policy;
    return policy.id;
  }

  async dispose(client: ContentClient): Promise<void> {
    this.created = await client.retireRetentionPolicy(this.policy.id);
  }
}

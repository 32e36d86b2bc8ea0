import { vi } from "vitest";
import type { AccessLevel, CommandScope } from "@testbed/schemas";
import type { Command, DisposableCommand } from "../commands/types.js";
import type { RunConfig, SessionProvider } from "../lifecycle/session.js";
import type { Logger } from "../logger.js";

// ---------------------------------------------------------------------------
// Distinguishable client handles
// ---------------------------------------------------------------------------
export interface FakeClient {
  readonly label: "admin" | "user";
}

export const ADMIN: FakeClient = { label: "admin" };
export const USER: FakeClient = { label: "user" };

// ---------------------------------------------------------------------------
// Commands that record what happened to them in a shared journal
// ---------------------------------------------------------------------------
export class RecordingCommand implements DisposableCommand<FakeClient> {
  executedWith: FakeClient | null = null;
  disposedWith: FakeClient | null = null;

  constructor(
    readonly resourceId: string,
    readonly scope: CommandScope,
    readonly accessLevel: AccessLevel,
    private readonly journal: string[],
    private readonly failOn: "execute" | "dispose" | null = null,
  ) {}

  async execute(client: FakeClient): Promise<string> {
    this.executedWith = client;
    if (this.failOn === "execute") {
      throw new Error(`create ${this.resourceId} failed`);
    }
    this.journal.push(`create ${this.resourceId}`);
    return this.resourceId;
  }

  async dispose(client: FakeClient): Promise<void> {
    this.disposedWith = client;
    if (this.failOn === "dispose") {
      throw new Error(`delete ${this.resourceId} failed`);
    }
    this.journal.push(`delete ${this.resourceId}`);
  }
}

export class OneShotCommand implements Command<FakeClient> {
  executedWith: FakeClient | null = null;

  constructor(
    readonly resourceId: string,
    readonly accessLevel: AccessLevel,
    private readonly journal: string[],
  ) {}

  async execute(client: FakeClient): Promise<string> {
    this.executedWith = client;
    this.journal.push(`run ${this.resourceId}`);
    return this.resourceId;
  }
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------
export function makeProvider(): SessionProvider<FakeClient, RunConfig> {
  return {
    connectAdmin: vi.fn(async () => ADMIN),
    createUser: vi.fn(async () => "usr_created"),
    connectUser: vi.fn(async () => USER),
    deleteUser: vi.fn(async () => {}),
  };
}

export function makeLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

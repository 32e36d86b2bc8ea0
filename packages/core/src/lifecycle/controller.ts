import type { CommandScope, LifecycleState } from "@testbed/schemas";
import type { Command, DisposableCommand } from "../commands/types.js";
import { isDisposableCommand } from "../commands/types.js";
import { ClientRouter } from "../router/client-router.js";
import { ScopeStack } from "../scope/scope-stack.js";
import { LifecycleError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { RunConfig, SessionProvider, SessionState } from "./session.js";

export interface LifecycleControllerConfig<TClient, TConfig extends RunConfig> {
  loadConfig: () => TConfig | Promise<TConfig>;
  sessionProvider: SessionProvider<TClient, TConfig>;
  logger?: Logger;
}

export interface LeakedCommand<TClient> {
  scope: CommandScope;
  command: DisposableCommand<TClient>;
}

type CommandStack<TClient> = ScopeStack<DisposableCommand<TClient>>;

/**
 * Drives the run → class → test lifetimes and owns one cleanup stack per
 * scope. Reversible commands executed through `execute` are disposed in
 * reverse order when their scope ends.
 */
export class LifecycleController<TClient, TConfig extends RunConfig = RunConfig> {
  private readonly loadConfig: () => TConfig | Promise<TConfig>;
  private readonly sessionProvider: SessionProvider<TClient, TConfig>;
  private readonly logger: Logger;

  private currentState: LifecycleState = "uninitialized";
  private sessionState: Readonly<SessionState<TClient>> | null = null;
  private router: ClientRouter<TClient> | null = null;
  private stacks: Record<CommandScope, CommandStack<TClient> | null> = {
    class: null,
    test: null,
  };
  private leaked: LeakedCommand<TClient>[] = [];

  constructor(config: LifecycleControllerConfig<TClient, TConfig>) {
    this.loadConfig = config.loadConfig;
    this.sessionProvider = config.sessionProvider;
    this.logger = config.logger ?? createLogger("lifecycle");
  }

  get state(): LifecycleState {
    return this.currentState;
  }

  get session(): Readonly<SessionState<TClient>> {
    if (!this.sessionState) {
      throw new LifecycleError(
        `Session is not available in state ${this.currentState}`,
        this.currentState,
      );
    }
    return this.sessionState;
  }

  // ---------------------------------------------------------------------------
  // Run
  // ---------------------------------------------------------------------------

  async startRun(): Promise<void> {
    this.expectState("uninitialized", "startRun");

    const config = await this.loadConfig();
    const adminClient = await this.sessionProvider.connectAdmin(config);

    let userId: string;
    let userCreated = false;
    if (config.userID) {
      userId = config.userID;
    } else {
      userId = await this.sessionProvider.createUser(adminClient);
      userCreated = true;
      this.logger.info({ userId }, "Created shared test user");
    }

    let userClient: TClient;
    try {
      userClient = await this.sessionProvider.connectUser(config, userId);
    } catch (err) {
      if (userCreated) {
        await this.deleteUserQuietly(adminClient, userId);
      }
      throw err;
    }

    const session = Object.freeze({ adminClient, userClient, userId, userCreated });
    this.sessionState = session;
    this.router = new ClientRouter(session);
    this.currentState = "run-active";
  }

  async endRun(): Promise<void> {
    if (this.currentState === "uninitialized") {
      // startRun failed or never ran
      this.currentState = "torn-down";
      return;
    }
    this.expectState("run-active", "endRun");

    const session = this.session;
    if (session.userCreated) {
      await this.deleteUserQuietly(session.adminClient, session.userId);
    }
    this.currentState = "torn-down";
  }

  // ---------------------------------------------------------------------------
  // Class and test scopes
  // ---------------------------------------------------------------------------

  startClass(): void {
    this.expectState("run-active", "startClass");
    this.stacks.class = new ScopeStack();
    this.currentState = "class-active";
  }

  async endClass(): Promise<void> {
    this.expectState("class-active", "endClass");
    const stack = this.takeStack("class");
    this.currentState = "run-active";
    await this.drain("class", stack);
  }

  startTest(): void {
    this.expectState("class-active", "startTest");
    this.stacks.test = new ScopeStack();
    this.currentState = "test-active";
  }

  async endTest(): Promise<void> {
    this.expectState("test-active", "endTest");
    const stack = this.takeStack("test");
    this.currentState = "class-active";
    await this.drain("test", stack);
  }

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  /**
   * Run `command` with the client for its access level. Reversible commands
   * are tracked on their scope's stack once `execute` resolves; a failed
   * execute leaves the stack untouched.
   */
  async execute(command: Command<TClient>): Promise<string> {
    const router = this.requireRouter();
    if (!isDisposableCommand(command)) {
      return command.execute(router.resolve(command.accessLevel));
    }

    const stack = this.activeStack(command.scope);
    const resourceId = await command.execute(router.resolve(command.accessLevel));
    stack.push(command);
    return resourceId;
  }

  /** Commands waiting for disposal in `scope`, next to be disposed first. */
  pending(scope: CommandScope): DisposableCommand<TClient>[] {
    return this.stacks[scope]?.toArray() ?? [];
  }

  leakedCommands(): readonly LeakedCommand<TClient>[] {
    return this.leaked;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async drain(scope: CommandScope, stack: CommandStack<TClient>): Promise<void> {
    const router = this.requireRouter();
    let command = stack.pop();
    while (command) {
      try {
        await command.dispose(router.resolve(command.accessLevel));
      } catch (err) {
        const undisposed = [command, ...stack.clear()];
        for (const entry of undisposed) {
          this.leaked.push({ scope, command: entry });
        }
        this.logger.error(
          {
            scope,
            leakedCount: undisposed.length,
            error: err instanceof Error ? err.message : String(err),
          },
          `Failed to dispose ${scope}-scoped command, remaining resources leaked`,
        );
        throw err;
      }
      command = stack.pop();
    }
  }

  private async deleteUserQuietly(adminClient: TClient, userId: string): Promise<void> {
    try {
      await this.sessionProvider.deleteUser(adminClient, userId);
      this.logger.info({ userId }, "Deleted shared test user");
    } catch (err) {
      // Deletion fails while the user still owns content
      this.logger.error(
        {
          userId,
          error: err instanceof Error ? err.message : String(err),
          stack: err instanceof Error ? err.stack : undefined,
        },
        "Failed to delete shared test user",
      );
    }
  }

  private activeStack(scope: CommandScope): CommandStack<TClient> {
    const stack = this.stacks[scope];
    if (!stack) {
      throw new LifecycleError(
        `No active ${scope} scope to track the command in (state: ${this.currentState})`,
        this.currentState,
      );
    }
    return stack;
  }

  private takeStack(scope: CommandScope): CommandStack<TClient> {
    const stack = this.activeStack(scope);
    this.stacks[scope] = null;
    return stack;
  }

  private requireRouter(): ClientRouter<TClient> {
    if (!this.router || this.currentState === "torn-down") {
      throw new LifecycleError(
        `Commands cannot run in state ${this.currentState}`,
        this.currentState,
      );
    }
    return this.router;
  }

  private expectState(expected: LifecycleState, operation: string): void {
    if (this.currentState !== expected) {
      throw new LifecycleError(
        `${operation} requires state ${expected}, current state is ${this.currentState}`,
        this.currentState,
      );
    }
  }
}

import type { ClientPair } from "../router/client-router.js";

/** The part of the run configuration the lifecycle itself reads. */
export interface RunConfig {
  userID?: string | undefined;
}

/**
 * Process-wide state established once at run start. Frozen after creation.
 */
export interface SessionState<TClient> extends ClientPair<TClient> {
  readonly userId: string;
  /** True when the run created `userId` and must delete it at run end. */
  readonly userCreated: boolean;
}

/**
 * Authentication and user management for one remote service.
 */
export interface SessionProvider<TClient, TConfig extends RunConfig> {
  connectAdmin(config: TConfig): Promise<TClient>;
  /** Create the shared test user and return its id. */
  createUser(adminClient: TClient): Promise<string>;
  connectUser(config: TConfig, userId: string): Promise<TClient>;
  deleteUser(adminClient: TClient, userId: string): Promise<void>;
}

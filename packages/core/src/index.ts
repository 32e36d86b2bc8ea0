// Commands
export { isDisposableCommand } from "./commands/types.js";
export type { Command, DisposableCommand } from "./commands/types.js";

// Routing and scopes
export { ClientRouter } from "./router/client-router.js";
export type { ClientPair } from "./router/client-router.js";
export { ScopeStack } from "./scope/scope-stack.js";

// Lifecycle
export { LifecycleController } from "./lifecycle/controller.js";
export type { LifecycleControllerConfig, LeakedCommand } from "./lifecycle/controller.js";
export type { RunConfig, SessionProvider, SessionState } from "./lifecycle/session.js";
export { registerRunHooks, registerClassHooks } from "./lifecycle/hooks.js";
export type { LifecycleHookRegistrar } from "./lifecycle/hooks.js";

// Configuration
export { loadJsonConfig, DEFAULT_CONFIG_ENV_VAR } from "./config/loader.js";
export type { LoadConfigOptions } from "./config/loader.js";

// Ambient
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { LifecycleError, ConfigError } from "./errors.js";
export { uniqueName } from "./utils/naming.js";

import type { LifecycleController } from "./controller.js";
import type { RunConfig } from "./session.js";

/**
 * The hook registration functions of a test runner (vitest, jest, mocha).
 */
export interface LifecycleHookRegistrar {
  beforeAll(fn: () => Promise<void>): void;
  afterAll(fn: () => Promise<void>): void;
  beforeEach(fn: () => Promise<void>): void;
  afterEach(fn: () => Promise<void>): void;
}

/**
 * Start the run before the first test of the file and tear it down after the
 * last one. Call at the top level of a test file or setup file.
 */
export function registerRunHooks<TClient, TConfig extends RunConfig>(
  controller: LifecycleController<TClient, TConfig>,
  hooks: Pick<LifecycleHookRegistrar, "beforeAll" | "afterAll">,
): void {
  hooks.beforeAll(async () => {
    await controller.startRun();
  });
  hooks.afterAll(async () => {
    await controller.endRun();
  });
}

/**
 * Open a class scope for the enclosing `describe` block and a test scope
 * around each of its tests.
 */
export function registerClassHooks<TClient, TConfig extends RunConfig>(
  controller: LifecycleController<TClient, TConfig>,
  hooks: LifecycleHookRegistrar,
): void {
  hooks.beforeAll(async () => {
    controller.startClass();
  });
  hooks.afterAll(async () => {
    await controller.endClass();
  });
  hooks.beforeEach(async () => {
    controller.startTest();
  });
  hooks.afterEach(async () => {
    await controller.endTest();
  });
}

import { fileURLToPath } from "node:url";
import { afterAll, afterEach, beforeAll, beforeEach } from "vitest";
import { registerClassHooks, registerRunHooks } from "@testbed/core";
import { bootstrapContentLifecycle } from "@testbed/content-cloud";
import type { ContentController, ContentLifecycle } from "@testbed/content-cloud";

const CONFIG_PATH = fileURLToPath(new URL("../config.json", import.meta.url));

/**
 * Start a run for the current test file. Set INTEGRATION_TESTING_CONFIG to
 * point the suites at a real account; the bundled config.json uses the
 * in-memory service.
 */
export function useContentLifecycle(): ContentLifecycle {
  const lifecycle = bootstrapContentLifecycle({ configPath: CONFIG_PATH });
  registerRunHooks(lifecycle.controller, { beforeAll, afterAll });
  return lifecycle;
}

/** Call inside a `describe` block to give it a class scope. */
export function useClassScope(controller: ContentController): void {
  registerClassHooks(controller, { beforeAll, afterAll, beforeEach, afterEach });
}

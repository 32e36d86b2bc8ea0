import { IntegrationConfigSchema } from "@testbed/schemas";
import type { IntegrationConfig } from "@testbed/schemas";
import { LifecycleController, createLogger, loadJsonConfig } from "@testbed/core";
import type { Logger } from "@testbed/core";
import type { ContentClient } from "./providers/content-client.js";
import type { InMemoryContentService } from "./providers/in-memory.js";
import { createContentSession } from "./session/factory.js";
import { ContentSessionProvider } from "./session/provider.js";
import { ContentFixtures } from "./helpers/fixtures.js";
import type { ContentController } from "./helpers/fixtures.js";

export interface ContentLifecycleOptions {
  /** JSON file read when INTEGRATION_TESTING_CONFIG is unset. */
  configPath: string;
  env?: Record<string, string | undefined>;
  logger?: Logger;
  /** Backing store for `memory://` configurations. A fresh one is created when omitted. */
  service?: InMemoryContentService;
}

export interface ContentLifecycle {
  controller: ContentController;
  fixtures: ContentFixtures;
}

export function bootstrapContentLifecycle(options: ContentLifecycleOptions): ContentLifecycle {
  const logger = options.logger ?? createLogger("content-cloud");

  const controller = new LifecycleController<ContentClient, IntegrationConfig>({
    loadConfig: () =>
      loadJsonConfig(IntegrationConfigSchema, {
        filePath: options.configPath,
        env: options.env,
        logger,
      }),
    sessionProvider: new ContentSessionProvider((config) =>
      createContentSession(config, options.service),
    ),
    logger,
  });

  return { controller, fixtures: new ContentFixtures(controller) };
}

import type { IntegrationConfig } from "@testbed/schemas";
import type { ContentSession } from "./session.js";
import { ClientCredentialsSession, InMemoryContentSession } from "./session.js";
import { InMemoryContentService } from "../providers/in-memory.js";

export const MEMORY_SCHEME = "memory:";

export function createContentSession(
  config: IntegrationConfig,
  service?: InMemoryContentService,
): ContentSession {
  // A memory:// base URL selects the in-process service, anything else is HTTP.
  if (config.apiBaseUrl.startsWith(MEMORY_SCHEME)) {
    return new InMemoryContentSession(service ?? new InMemoryContentService(), config.enterpriseId);
  }
  return new ClientCredentialsSession(config);
}

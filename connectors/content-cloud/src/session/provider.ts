import type { IntegrationConfig } from "@testbed/schemas";
import type { SessionProvider } from "@testbed/core";
import { uniqueName } from "@testbed/core";
import type { ContentClient } from "../providers/content-client.js";
import type { ContentSession } from "./session.js";
import { createContentSession } from "./factory.js";

/**
 * Adapts a {@link ContentSession} to the lifecycle's session contract. The
 * session is created from the configuration the run loads.
 */
export class ContentSessionProvider implements SessionProvider<ContentClient, IntegrationConfig> {
  private createSession: (config: IntegrationConfig) => ContentSession;
  private session: ContentSession | null = null;

  constructor(createSession: (config: IntegrationConfig) => ContentSession = createContentSession) {
    this.createSession = createSession;
  }

  async connectAdmin(config: IntegrationConfig): Promise<ContentClient> {
    const session = this.sessionFor(config);
    const token = await session.adminToken();
    return session.adminClient(token);
  }

  async createUser(adminClient: ContentClient): Promise<string> {
    const user = await adminClient.createEnterpriseUser({
      name: uniqueName("IT App User"),
      isPlatformAccessOnly: true,
    });
    return user.id;
  }

  async connectUser(config: IntegrationConfig, userId: string): Promise<ContentClient> {
    const session = this.sessionFor(config);
    const token = await session.userToken(userId);
    return session.userClient(token, userId);
  }

  async deleteUser(adminClient: ContentClient, userId: string): Promise<void> {
    await adminClient.deleteEnterpriseUser(userId, { notify: false, force: true });
  }

  private sessionFor(config: IntegrationConfig): ContentSession {
    if (!this.session) {
      this.session = this.createSession(config);
    }
    return this.session;
  }
}

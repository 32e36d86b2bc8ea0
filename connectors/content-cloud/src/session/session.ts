import { z } from "zod";
import type { IntegrationConfig } from "@testbed/schemas";
import type { ContentClient } from "../providers/content-client.js";
import { HttpContentClient } from "../providers/http.js";
import { InMemoryContentClient } from "../providers/in-memory.js";
import type { InMemoryContentService } from "../providers/in-memory.js";
import { ContentApiError, ContentAuthError } from "../providers/errors.js";

export interface AccessToken {
  accessToken: string;
  expiresIn: number;
}

/**
 * Issues tokens for the enterprise account and for individual users, and
 * turns them into clients.
 */
export interface ContentSession {
  adminToken(): Promise<AccessToken>;
  userToken(userId: string): Promise<AccessToken>;
  adminClient(token: AccessToken): ContentClient;
  userClient(token: AccessToken, userId: string): ContentClient;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
  token_type: z.string(),
});

const TokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * Client-credentials grant against the service's token endpoint. The
 * subject (enterprise or user) decides what the token may act as.
 */
export class ClientCredentialsSession implements ContentSession {
  private config: IntegrationConfig;
  private authUrl: string;

  constructor(config: IntegrationConfig) {
    this.config = config;
    this.authUrl = config.authUrl ?? new URL("/oauth2/token", config.apiBaseUrl).toString();
  }

  adminToken(): Promise<AccessToken> {
    return this.requestToken("enterprise", this.config.enterpriseId);
  }

  userToken(userId: string): Promise<AccessToken> {
    return this.requestToken("user", userId);
  }

  adminClient(token: AccessToken): ContentClient {
    return new HttpContentClient({
      apiBaseUrl: this.config.apiBaseUrl,
      uploadBaseUrl: this.config.uploadBaseUrl,
      accessToken: token.accessToken,
      subject: { type: "enterprise", id: this.config.enterpriseId },
    });
  }

  userClient(token: AccessToken, userId: string): ContentClient {
    return new HttpContentClient({
      apiBaseUrl: this.config.apiBaseUrl,
      uploadBaseUrl: this.config.uploadBaseUrl,
      accessToken: token.accessToken,
      subject: { type: "user", id: userId },
    });
  }

  private async requestToken(
    subjectType: "enterprise" | "user",
    subjectId: string,
  ): Promise<AccessToken> {
    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.config.appSettings.clientId,
      client_secret: this.config.appSettings.clientSecret,
      subject_type: subjectType,
      subject_id: subjectId,
    });

    const response = await fetch(this.authUrl, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: body.toString(),
    });
    const json: unknown = await response.json();

    if (!response.ok) {
      const parsed = TokenErrorSchema.safeParse(json);
      const reason = parsed.success
        ? (parsed.data.error_description ?? parsed.data.error)
        : `HTTP ${response.status}`;
      throw new ContentAuthError(`Token request for ${subjectType} ${subjectId} failed: ${reason}`);
    }

    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ContentApiError("Token endpoint returned an unexpected body", 502, "bad_token_response");
    }
    return { accessToken: parsed.data.access_token, expiresIn: parsed.data.expires_in };
  }
}

/**
 * Session over an {@link InMemoryContentService}. Tokens are opaque strings;
 * user tokens are only issued for users the service knows.
 */
export class InMemoryContentSession implements ContentSession {
  private service: InMemoryContentService;
  private enterpriseId: string;
  private issued = 0;

  constructor(service: InMemoryContentService, enterpriseId: string) {
    this.service = service;
    this.enterpriseId = enterpriseId;
  }

  async adminToken(): Promise<AccessToken> {
    return { accessToken: `memory-enterprise-${++this.issued}`, expiresIn: 3600 };
  }

  async userToken(userId: string): Promise<AccessToken> {
    if (!this.service.hasUser(userId)) {
      throw new ContentAuthError(`Token request for user ${userId} failed: unknown user`);
    }
    return { accessToken: `memory-user-${++this.issued}`, expiresIn: 3600 };
  }

  adminClient(_token: AccessToken): ContentClient {
    return new InMemoryContentClient(this.service, { type: "enterprise", id: this.enterpriseId });
  }

  userClient(_token: AccessToken, userId: string): ContentClient {
    return new InMemoryContentClient(this.service, { type: "user", id: userId });
  }
}

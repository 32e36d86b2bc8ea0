import { z } from "zod";
import type {
  ContentFile,
  ContentFolder,
  ContentUser,
  RetentionPolicy,
  RetentionPolicyAssignment,
} from "@testbed/schemas";
import type {
  ContentClient,
  ContentSubject,
  CreateFolderRequest,
  CreateRetentionPolicyRequest,
  CreateUserRequest,
  UploadFileRequest,
} from "./content-client.js";
import {
  ContentApiError,
  ContentAuthError,
  ContentConflictError,
  ContentNotFoundError,
} from "./errors.js";

// ---------------------------------------------------------------------------
// Wire shapes
// ---------------------------------------------------------------------------

const RefSchema = z.object({ id: z.string() });

const RawUserSchema = z.object({
  id: z.string(),
  name: z.string(),
  login: z.string().nullable().optional(),
  is_platform_access_only: z.boolean().optional(),
});

const RawFolderSchema = z.object({
  id: z.string(),
  name: z.string(),
  parent: RefSchema.nullable().optional(),
  owned_by: RefSchema,
});

const RawFileSchema = z.object({
  id: z.string(),
  name: z.string(),
  parent: RefSchema,
  owned_by: RefSchema,
  size: z.number(),
  sha1: z.string(),
});

const RawUploadSchema = z.object({
  entries: z.array(RawFileSchema),
});

const RawPolicySchema = z.object({
  id: z.string(),
  policy_name: z.string(),
  policy_type: z.enum(["finite", "indefinite"]),
  retention_length: z.union([z.string(), z.number()]),
  disposition_action: z.enum(["permanently_delete", "remove_retention"]),
  status: z.enum(["active", "retired"]),
});

const RawAssignmentSchema = z.object({
  id: z.string(),
  retention_policy: RefSchema,
  assigned_to: z.object({ type: z.string(), id: z.string() }),
});

const ApiErrorBodySchema = z.object({
  type: z.literal("error"),
  status: z.number().optional(),
  code: z.string().optional(),
  message: z.string().optional(),
  request_id: z.string().optional(),
});

function parseUser(raw: z.infer<typeof RawUserSchema>): ContentUser {
  return {
    id: raw.id,
    type: "user",
    name: raw.name,
    login: raw.login ?? null,
    isPlatformAccessOnly: raw.is_platform_access_only ?? false,
  };
}

function parseFolder(raw: z.infer<typeof RawFolderSchema>): ContentFolder {
  return {
    id: raw.id,
    type: "folder",
    name: raw.name,
    parentId: raw.parent?.id ?? null,
    ownerId: raw.owned_by.id,
  };
}

function parseFile(raw: z.infer<typeof RawFileSchema>): ContentFile {
  return {
    id: raw.id,
    type: "file",
    name: raw.name,
    parentId: raw.parent.id,
    ownerId: raw.owned_by.id,
    size: raw.size,
    sha1: raw.sha1,
  };
}

function parsePolicy(raw: z.infer<typeof RawPolicySchema>): RetentionPolicy {
  const length = Number(raw.retention_length);
  return {
    id: raw.id,
    type: "retention_policy",
    name: raw.policy_name,
    policyType: raw.policy_type,
    retentionLengthDays: Number.isInteger(length) && length > 0 ? length : null,
    dispositionAction: raw.disposition_action,
    status: raw.status,
  };
}

function parseAssignment(raw: z.infer<typeof RawAssignmentSchema>): RetentionPolicyAssignment {
  return {
    id: raw.id,
    type: "retention_policy_assignment",
    policyId: raw.retention_policy.id,
    folderId: raw.assigned_to.id,
  };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface HttpContentClientConfig {
  apiBaseUrl: string;
  /** Default: apiBaseUrl */
  uploadBaseUrl?: string;
  accessToken: string;
  subject: ContentSubject;
}

interface RequestOptions {
  query?: Record<string, string>;
  body?: Record<string, unknown>;
  form?: FormData;
  upload?: boolean;
  /** What a 404 refers to. */
  target?: { resource: string; id: string };
}

export class HttpContentClient implements ContentClient {
  readonly subject: ContentSubject;
  private apiBaseUrl: string;
  private uploadBaseUrl: string;
  private accessToken: string;

  constructor(config: HttpContentClientConfig) {
    this.subject = config.subject;
    this.apiBaseUrl = config.apiBaseUrl.replace(/\/+$/, "");
    this.uploadBaseUrl = (config.uploadBaseUrl ?? config.apiBaseUrl).replace(/\/+$/, "");
    this.accessToken = config.accessToken;
  }

  async createEnterpriseUser(request: CreateUserRequest): Promise<ContentUser> {
    const response = await this.request("POST", "/users", {
      body: { name: request.name, is_platform_access_only: request.isPlatformAccessOnly },
    });
    return parseUser(await this.json(RawUserSchema, response));
  }

  async deleteEnterpriseUser(
    userId: string,
    options: { notify: boolean; force: boolean },
  ): Promise<void> {
    await this.request("DELETE", `/users/${encodeURIComponent(userId)}`, {
      query: { notify: String(options.notify), force: String(options.force) },
      target: { resource: "user", id: userId },
    });
  }

  async uploadFile(request: UploadFileRequest): Promise<ContentFile> {
    const form = new FormData();
    form.set("attributes", JSON.stringify({ name: request.name, parent: { id: request.parentId } }));
    form.set("file", new Blob([request.content]), request.name);

    const response = await this.request("POST", "/files/content", {
      form,
      upload: true,
      target: { resource: "folder", id: request.parentId },
    });
    const upload = await this.json(RawUploadSchema, response);
    const entry = upload.entries[0];
    if (!entry) {
      throw new ContentApiError("Upload response contained no file entry", 502, "empty_upload_response");
    }
    return parseFile(entry);
  }

  async getFile(fileId: string): Promise<ContentFile> {
    const response = await this.request("GET", `/files/${encodeURIComponent(fileId)}`, {
      target: { resource: "file", id: fileId },
    });
    return parseFile(await this.json(RawFileSchema, response));
  }

  async deleteFile(fileId: string): Promise<void> {
    await this.request("DELETE", `/files/${encodeURIComponent(fileId)}`, {
      target: { resource: "file", id: fileId },
    });
  }

  async createFolder(request: CreateFolderRequest): Promise<ContentFolder> {
    const response = await this.request("POST", "/folders", {
      body: { name: request.name, parent: { id: request.parentId } },
      target: { resource: "folder", id: request.parentId },
    });
    return parseFolder(await this.json(RawFolderSchema, response));
  }

  async getFolder(folderId: string): Promise<ContentFolder> {
    const response = await this.request("GET", `/folders/${encodeURIComponent(folderId)}`, {
      target: { resource: "folder", id: folderId },
    });
    return parseFolder(await this.json(RawFolderSchema, response));
  }

  async deleteFolder(folderId: string, options: { recursive: boolean }): Promise<void> {
    await this.request("DELETE", `/folders/${encodeURIComponent(folderId)}`, {
      query: { recursive: String(options.recursive) },
      target: { resource: "folder", id: folderId },
    });
  }

  async createRetentionPolicy(request: CreateRetentionPolicyRequest): Promise<RetentionPolicy> {
    const body: Record<string, unknown> = {
      policy_name: request.name,
      policy_type: request.policyType,
      disposition_action: request.dispositionAction,
    };
    if (request.retentionLengthDays !== null) {
      body["retention_length"] = request.retentionLengthDays;
    }
    const response = await this.request("POST", "/retention_policies", { body });
    return parsePolicy(await this.json(RawPolicySchema, response));
  }

  async assignRetentionPolicy(
    policyId: string,
    folderId: string,
  ): Promise<RetentionPolicyAssignment> {
    const response = await this.request("POST", "/retention_policy_assignments", {
      body: { policy_id: policyId, assign_to: { type: "folder", id: folderId } },
      target: { resource: "retention policy", id: policyId },
    });
    return parseAssignment(await this.json(RawAssignmentSchema, response));
  }

  async retireRetentionPolicy(policyId: string): Promise<RetentionPolicy> {
    const response = await this.request(
      "PUT",
      `/retention_policies/${encodeURIComponent(policyId)}`,
      { body: { status: "retired" }, target: { resource: "retention policy", id: policyId } },
    );
    return parsePolicy(await this.json(RawPolicySchema, response));
  }

  // ---------------------------------------------------------------------------
  // Internal HTTP helpers
  // ---------------------------------------------------------------------------

  private async request(
    method: string,
    path: string,
    options: RequestOptions = {},
  ): Promise<Response> {
    const base = options.upload ? this.uploadBaseUrl : this.apiBaseUrl;
    const url = new URL(`${base}${path}`);
    for (const [k, v] of Object.entries(options.query ?? {})) {
      url.searchParams.set(k, v);
    }

    const headers: Record<string, string> = { Authorization: `Bearer ${this.accessToken}` };
    const fetchOptions: RequestInit = { method, headers };
    if (options.form) {
      fetchOptions.body = options.form;
    } else if (options.body) {
      headers["Content-Type"] = "application/json";
      fetchOptions.body = JSON.stringify(options.body);
    }

    const response = await fetch(url.toString(), fetchOptions);
    if (!response.ok) {
      throw await this.toError(response, options.target);
    }
    return response;
  }

  private async json<S extends z.ZodTypeAny>(schema: S, response: Response): Promise<z.output<S>> {
    const body: unknown = await response.json();
    return schema.parse(body);
  }

  private async toError(
    response: Response,
    target?: { resource: string; id: string },
  ): Promise<ContentApiError> {
    const text = await response.text();
    const parsed = ApiErrorBodySchema.safeParse(parseJson(text));
    const body = parsed.success ? parsed.data : null;
    const message = body?.message ?? `Content API HTTP ${response.status}: ${text}`;
    const requestId = body?.request_id;

    if (response.status === 401) {
      return new ContentAuthError(message, requestId);
    }
    if (response.status === 404 && target) {
      return new ContentNotFoundError(target.resource, target.id, requestId);
    }
    if (response.status === 409) {
      return new ContentConflictError(message, requestId);
    }
    return new ContentApiError(message, response.status, body?.code ?? "http_error", requestId);
  }
}

import { createHash } from "node:crypto";
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
import { ROOT_FOLDER_ID } from "./content-client.js";
import {
  ContentApiError,
  ContentConflictError,
  ContentNotFoundError,
} from "./errors.js";

/**
 * Process-local stand-in for the content cloud. Several clients (admin and
 * user) share one service so that what one creates the other can see.
 */
export class InMemoryContentService {
  private users = new Map<string, ContentUser>();
  private folders = new Map<string, ContentFolder>();
  private files = new Map<string, ContentFile>();
  private policies = new Map<string, RetentionPolicy>();
  private assignments = new Map<string, RetentionPolicyAssignment>();
  private nextId = 100;

  constructor() {
    this.folders.set(ROOT_FOLDER_ID, {
      id: ROOT_FOLDER_ID,
      type: "folder",
      name: "All Files",
      parentId: null,
      ownerId: "",
    });
  }

  private genId(prefix: string): string {
    return `${prefix}_mem_${this.nextId++}`;
  }

  // ── Inspection ──

  listUsers(): ContentUser[] {
    return [...this.users.values()].map((u) => ({ ...u }));
  }

  listFolders(): ContentFolder[] {
    return [...this.folders.values()]
      .filter((f) => f.id !== ROOT_FOLDER_ID)
      .map((f) => ({ ...f }));
  }

  listFiles(): ContentFile[] {
    return [...this.files.values()].map((f) => ({ ...f }));
  }

  listPolicies(): RetentionPolicy[] {
    return [...this.policies.values()].map((p) => ({ ...p }));
  }

  listAssignments(): RetentionPolicyAssignment[] {
    return [...this.assignments.values()].map((a) => ({ ...a }));
  }

  hasUser(userId: string): boolean {
    return this.users.has(userId);
  }

  // ── Users ──

  createUser(request: CreateUserRequest): ContentUser {
    const user: ContentUser = {
      id: this.genId("usr"),
      type: "user",
      name: request.name,
      login: null,
      isPlatformAccessOnly: request.isPlatformAccessOnly,
    };
    this.users.set(user.id, user);
    return { ...user };
  }

  deleteUser(userId: string, force: boolean): void {
    if (!this.users.has(userId)) {
      throw new ContentNotFoundError("user", userId);
    }
    const ownedFolders = [...this.folders.values()].filter((f) => f.ownerId === userId);
    const ownedFiles = [...this.files.values()].filter((f) => f.ownerId === userId);
    if (!force && (ownedFolders.length > 0 || ownedFiles.length > 0)) {
      throw new ContentApiError(
        `User '${userId}' still owns ${ownedFolders.length + ownedFiles.length} item(s)`,
        400,
        "user_not_deleted",
      );
    }
    for (const file of ownedFiles) this.files.delete(file.id);
    for (const folder of ownedFolders) this.removeFolderTree(folder.id);
    this.users.delete(userId);
  }

  // ── Files ──

  uploadFile(request: UploadFileRequest, ownerId: string): ContentFile {
    this.requireFolder(request.parentId);
    this.assertNameFree(request.parentId, request.name);
    const file: ContentFile = {
      id: this.genId("file"),
      type: "file",
      name: request.name,
      parentId: request.parentId,
      ownerId,
      size: request.content.byteLength,
      sha1: createHash("sha1").update(request.content).digest("hex"),
    };
    this.files.set(file.id, file);
    return { ...file };
  }

  getFile(fileId: string): ContentFile {
    const file = this.files.get(fileId);
    if (!file) throw new ContentNotFoundError("file", fileId);
    return { ...file };
  }

  deleteFile(fileId: string): void {
    if (!this.files.delete(fileId)) {
      throw new ContentNotFoundError("file", fileId);
    }
  }

  // ── Folders ──

  createFolder(request: CreateFolderRequest, ownerId: string): ContentFolder {
    this.requireFolder(request.parentId);
    this.assertNameFree(request.parentId, request.name);
    const folder: ContentFolder = {
      id: this.genId("folder"),
      type: "folder",
      name: request.name,
      parentId: request.parentId,
      ownerId,
    };
    this.folders.set(folder.id, folder);
    return { ...folder };
  }

  getFolder(folderId: string): ContentFolder {
    return { ...this.requireFolder(folderId) };
  }

  deleteFolder(folderId: string, recursive: boolean): void {
    this.requireFolder(folderId);
    if (folderId === ROOT_FOLDER_ID) {
      throw new ContentApiError("The root folder cannot be deleted", 403, "access_denied");
    }
    const hasChildren =
      [...this.files.values()].some((f) => f.parentId === folderId) ||
      [...this.folders.values()].some((f) => f.parentId === folderId);
    if (hasChildren && !recursive) {
      throw new ContentApiError(`Folder '${folderId}' is not empty`, 400, "folder_not_empty");
    }
    this.removeFolderTree(folderId);
  }

  // ── Retention ──

  createRetentionPolicy(request: CreateRetentionPolicyRequest): RetentionPolicy {
    if ([...this.policies.values()].some((p) => p.name === request.name)) {
      throw new ContentConflictError(`Retention policy '${request.name}' already exists`);
    }
    if (request.policyType === "finite" && request.retentionLengthDays === null) {
      throw new ContentApiError(
        "Finite retention policies need a retention length",
        400,
        "bad_request",
      );
    }
    const policy: RetentionPolicy = {
      id: this.genId("rp"),
      type: "retention_policy",
      name: request.name,
      policyType: request.policyType,
      retentionLengthDays: request.policyType === "finite" ? request.retentionLengthDays : null,
      dispositionAction: request.dispositionAction,
      status: "active",
    };
    this.policies.set(policy.id, policy);
    return { ...policy };
  }

  assignRetentionPolicy(policyId: string, folderId: string): RetentionPolicyAssignment {
    const policy = this.policies.get(policyId);
    if (!policy) throw new ContentNotFoundError("retention policy", policyId);
    if (policy.status === "retired") {
      throw new ContentApiError(`Retention policy '${policyId}' is retired`, 400, "bad_request");
    }
    this.requireFolder(folderId);
    const assignment: RetentionPolicyAssignment = {
      id: this.genId("rpa"),
      type: "retention_policy_assignment",
      policyId,
      folderId,
    };
    this.assignments.set(assignment.id, assignment);
    return { ...assignment };
  }

  retireRetentionPolicy(policyId: string): RetentionPolicy {
    const policy = this.policies.get(policyId);
    if (!policy) throw new ContentNotFoundError("retention policy", policyId);
    const retired: RetentionPolicy = { ...policy, status: "retired" };
    this.policies.set(policyId, retired);
    return { ...retired };
  }

  // ── Internals ──

  private requireFolder(folderId: string): ContentFolder {
    const folder = this.folders.get(folderId);
    if (!folder) throw new ContentNotFoundError("folder", folderId);
    return folder;
  }

  private assertNameFree(parentId: string, name: string): void {
    const taken =
      [...this.files.values()].some((f) => f.parentId === parentId && f.name === name) ||
      [...this.folders.values()].some((f) => f.parentId === parentId && f.name === name);
    if (taken) {
      throw new ContentConflictError(`Item with the same name already exists: '${name}'`);
    }
  }

  private removeFolderTree(folderId: string): void {
    if (!this.folders.has(folderId)) return;
    for (const child of [...this.folders.values()].filter((f) => f.parentId === folderId)) {
      this.removeFolderTree(child.id);
    }
    for (const file of [...this.files.values()].filter((f) => f.parentId === folderId)) {
      this.files.delete(file.id);
    }
    this.folders.delete(folderId);
  }
}

/**
 * A client bound to one subject of an {@link InMemoryContentService}.
 */
export class InMemoryContentClient implements ContentClient {
  readonly subject: ContentSubject;
  private service: InMemoryContentService;

  constructor(service: InMemoryContentService, subject: ContentSubject) {
    this.service = service;
    this.subject = subject;
  }

  async createEnterpriseUser(request: CreateUserRequest): Promise<ContentUser> {
    this.requireEnterprise("create users");
    return this.service.createUser(request);
  }

  async deleteEnterpriseUser(
    userId: string,
    options: { notify: boolean; force: boolean },
  ): Promise<void> {
    this.requireEnterprise("delete users");
    this.service.deleteUser(userId, options.force);
  }

  async uploadFile(request: UploadFileRequest): Promise<ContentFile> {
    return this.service.uploadFile(request, this.subject.id);
  }

  async getFile(fileId: string): Promise<ContentFile> {
    return this.service.getFile(fileId);
  }

  async deleteFile(fileId: string): Promise<void> {
    this.service.deleteFile(fileId);
  }

  async createFolder(request: CreateFolderRequest): Promise<ContentFolder> {
    return this.service.createFolder(request, this.subject.id);
  }

  async getFolder(folderId: string): Promise<ContentFolder> {
    return this.service.getFolder(folderId);
  }

  async deleteFolder(folderId: string, options: { recursive: boolean }): Promise<void> {
    this.service.deleteFolder(folderId, options.recursive);
  }

  async createRetentionPolicy(request: CreateRetentionPolicyRequest): Promise<RetentionPolicy> {
    this.requireEnterprise("manage retention policies");
    return this.service.createRetentionPolicy(request);
  }

  async assignRetentionPolicy(
    policyId: string,
    folderId: string,
  ): Promise<RetentionPolicyAssignment> {
    this.requireEnterprise("manage retention policies");
    return this.service.assignRetentionPolicy(policyId, folderId);
  }

  async retireRetentionPolicy(policyId: string): Promise<RetentionPolicy> {
    this.requireEnterprise("manage retention policies");
    return this.service.retireRetentionPolicy(policyId);
  }

  private requireEnterprise(action: string): void {
    if (this.subject.type !== "enterprise") {
      throw new ContentApiError(
        `Only the enterprise account may ${action}`,
        403,
        "access_denied_insufficient_permissions",
      );
    }
  }
}

import type {
  ContentFile,
  ContentFolder,
  ContentUser,
  RetentionPolicy,
  RetentionPolicyAssignment,
} from "@testbed/schemas";

/** Who a client acts as: the enterprise service account or a single user. */
export interface ContentSubject {
  type: "enterprise" | "user";
  id: string;
}

export interface CreateUserRequest {
  name: string;
  isPlatformAccessOnly: boolean;
}

export interface UploadFileRequest {
  name: string;
  parentId: string;
  content: Uint8Array;
}

export interface CreateFolderRequest {
  name: string;
  parentId: string;
}

export interface CreateRetentionPolicyRequest {
  name: string;
  policyType: RetentionPolicy["policyType"];
  /** Required for finite policies. */
  retentionLengthDays: number | null;
  dispositionAction: RetentionPolicy["dispositionAction"];
}

export interface ContentClient {
  readonly subject: ContentSubject;

  // Users (enterprise only)
  createEnterpriseUser(request: CreateUserRequest): Promise<ContentUser>;
  deleteEnterpriseUser(userId: string, options: { notify: boolean; force: boolean }): Promise<void>;

  // Files
  uploadFile(request: UploadFileRequest): Promise<ContentFile>;
  getFile(fileId: string): Promise<ContentFile>;
  deleteFile(fileId: string): Promise<void>;

  // Folders
  createFolder(request: CreateFolderRequest): Promise<ContentFolder>;
  getFolder(folderId: string): Promise<ContentFolder>;
  deleteFolder(folderId: string, options: { recursive: boolean }): Promise<void>;

  // Retention (enterprise only)
  createRetentionPolicy(request: CreateRetentionPolicyRequest): Promise<RetentionPolicy>;
  assignRetentionPolicy(policyId: string, folderId: string): Promise<RetentionPolicyAssignment>;
  retireRetentionPolicy(policyId: string): Promise<RetentionPolicy>;
}

/** Id of the root folder every account starts with. */
export const ROOT_FOLDER_ID = "0";

// Client
export { ROOT_FOLDER_ID } from "./providers/content-client.js";
export type {
  ContentClient,
  ContentSubject,
  CreateUserRequest,
  UploadFileRequest,
  CreateFolderRequest,
  CreateRetentionPolicyRequest,
} from "./providers/content-client.js";
export { HttpContentClient } from "./providers/http.js";
export type { HttpContentClientConfig } from "./providers/http.js";
export { InMemoryContentService, InMemoryContentClient } from "./providers/in-memory.js";
export {
  ContentApiError,
  ContentAuthError,
  ContentNotFoundError,
  ContentConflictError,
} from "./providers/errors.js";

// Session
export { ClientCredentialsSession, InMemoryContentSession } from "./session/session.js";
export type { AccessToken, ContentSession } from "./session/session.js";
export { createContentSession, MEMORY_SCHEME } from "./session/factory.js";
export { ContentSessionProvider } from "./session/provider.js";

// Commands
export {
  CreateFileCommand,
  CreateFolderCommand,
  CreateRetentionPolicyCommand,
  DeleteFileCommand,
} from "./commands/index.js";

// Test fixtures
export { ContentFixtures } from "./helpers/fixtures.js";
export type { ContentController } from "./helpers/fixtures.js";
export { bootstrapContentLifecycle } from "./bootstrap.js";
export type { ContentLifecycle, ContentLifecycleOptions } from "./bootstrap.js";

export { CreateFileCommand } from "./create-file.js";
export { CreateFolderCommand } from "./create-folder.js";
export { CreateRetentionPolicyCommand } from "./create-retention-policy.js";
export { DeleteFileCommand } from "./delete-file.js";

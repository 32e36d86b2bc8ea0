import { z } from "zod";

export const ContentUserSchema = z.object({
  id: z.string(),
  type: z.literal("user"),
  name: z.string(),
  login: z.string().nullable(),
  isPlatformAccessOnly: z.boolean(),
});
export type ContentUser = z.infer<typeof ContentUserSchema>;

export const ContentFolderSchema = z.object({
  id: z.string(),
  type: z.literal("folder"),
  name: z.string(),
  parentId: z.string().nullable(),
  ownerId: z.string(),
});
export type ContentFolder = z.infer<typeof ContentFolderSchema>;

export const ContentFileSchema = z.object({
  id: z.string(),
  type: z.literal("file"),
  name: z.string(),
  parentId: z.string(),
  ownerId: z.string(),
  size: z.number().int().nonnegative(),
  sha1: z.string(),
});
export type ContentFile = z.infer<typeof ContentFileSchema>;

export const RetentionPolicyStatusSchema = z.enum(["active", "retired"]);
export type RetentionPolicyStatus = z.infer<typeof RetentionPolicyStatusSchema>;

export const RetentionPolicySchema = z.object({
  id: z.string(),
  type: z.literal("retention_policy"),
  name: z.string(),
  policyType: z.enum(["finite", "indefinite"]),
  retentionLengthDays: z.number().int().positive().nullable(),
  dispositionAction: z.enum(["permanently_delete", "remove_retention"]),
  status: RetentionPolicyStatusSchema,
});
export type RetentionPolicy = z.infer<typeof RetentionPolicySchema>;

export const RetentionPolicyAssignmentSchema = z.object({
  id: z.string(),
  type: z.literal("retention_policy_assignment"),
  policyId: z.string(),
  folderId: z.string(),
});
export type RetentionPolicyAssignment = z.infer<typeof RetentionPolicyAssignmentSchema>;

import { z } from "zod";

export const AccessLevelSchema = z.enum(["admin", "user"]);
export type AccessLevel = z.infer<typeof AccessLevelSchema>;

export const DEFAULT_ACCESS_LEVEL: AccessLevel = "user";

export const CommandScopeSchema = z.enum(["test", "class"]);
export type CommandScope = z.infer<typeof CommandScopeSchema>;

export const DEFAULT_COMMAND_SCOPE: CommandScope = "test";

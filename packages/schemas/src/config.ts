import { z } from "zod";

export const AppSettingsSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
});
export type AppSettings = z.infer<typeof AppSettingsSchema>;

/**
 * Connection settings for an integration run.
 *
 * `userID` names a pre-existing user to run the tests as. When it is absent or
 * empty, the run creates a throwaway user and deletes it again at the end.
 */
export const IntegrationConfigSchema = z.object({
  apiBaseUrl: z.string().min(1),
  uploadBaseUrl: z.string().min(1).optional(),
  authUrl: z.string().min(1).optional(),
  appSettings: AppSettingsSchema,
  enterpriseId: z.string().min(1),
  userID: z
    .string()
    .optional()
    .transform((value) => (value && value.length > 0 ? value : undefined)),
});
export type IntegrationConfig = z.infer<typeof IntegrationConfigSchema>;

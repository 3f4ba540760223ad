import { z } from "zod";

export const cleanupConfigSchema = z
  .object({
    days: z
      .number({ invalid_type_error: "`days` must be an integer" })
      .int("`days` must be an integer")
      .optional(),
    extensions: z
      .array(z.string().trim().min(1, "extensions must not be blank"))
      .min(1, "`extensions` must list at least one extension")
      .optional(),
    skipTokens: z
      .array(z.string().min(1, "skip tokens must not be blank"))
      .optional(),
  })
  .strict();

export type CleanupConfig = z.infer<typeof cleanupConfigSchema>;

import { z } from "zod";

export const UsernameSchema = z
  .string()
  .min(1, "username must not be empty")
  .regex(/^[^\s@]+$/, "username must not contain whitespace or '@'")
  .refine((name) => !name.startsWith("-"), "username must not start with '-'");

/** On-disk layout of the preference file. */
export const PreferencesFileSchema = z.object({
  default_username: z.union([UsernameSchema, z.literal("")]).default(""),
});

export const CliOptionsSchema = z
  .object({
    user: UsernameSchema.optional(),
    online: z.boolean().optional(),
    byHostname: z.boolean().optional(),
    pageSize: z
      .union([z.number(), z.string().trim().min(1)])
      .transform(Number)
      .pipe(z.number().int("must be a whole number").min(1).max(1000))
      .default(10),
    tailscale: z.string().min(1).default("tailscale"),
    ssh: z.string().min(1).default("ssh"),
    vimKeys: z.boolean().default(true),
    color: z.boolean().default(true),
    configDir: z.string().min(1).optional(),
  })
  .strict();

export type CliOptions = z.input<typeof CliOptionsSchema>;

import { z } from "zod";
import { ConfigError } from "../errors";

// Environment contract for the CLI; the token itself is optional here and
// checked when credentials are resolved.
export const envSchema = z.object({
  GITHUB_TOKEN: z.string().optional(),
  AUDIT_LOG_TOKEN: z.string().optional(),
  GITHUB_API_URL: z.string().url().optional(),
  AUDIT_LOG_TIMEOUT: z.coerce.number().int().positive().optional(),
});

export type CliEnv = z.infer<typeof envSchema>;

export function loadEnv(source: Record<string, string | undefined>): CliEnv {
  // Treat `VAR=` as unset.
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== ""),
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

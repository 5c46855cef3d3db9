import { z } from "zod";

const FLAG_OFF = new Set(["", "0", "false", "no", "off"]);

export const BackendEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(8787),
  DICTIONARY_PATH: z.string().trim().min(1).default("words.txt"),
  ADMIN_TOKEN: z.string().trim().min(1).optional(),
  DEBUG: z
    .string()
    .optional()
    .transform((value) => value !== undefined && !FLAG_OFF.has(value.trim().toLowerCase())),
});

export interface BackendConfig {
  readonly port: number;
  readonly dictionaryPath: string;
  /** Admin routes are disabled when unset */
  readonly adminToken: string | undefined;
  readonly debug: boolean;
}

export function loadBackendConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): BackendConfig {
  const parsed = BackendEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new Error(`Invalid environment: ${issues.join("; ")}`);
  }

  const { PORT, DICTIONARY_PATH, ADMIN_TOKEN, DEBUG } = parsed.data;
  return {
    port: PORT,
    dictionaryPath: DICTIONARY_PATH,
    adminToken: ADMIN_TOKEN,
    debug: DEBUG,
  };
}

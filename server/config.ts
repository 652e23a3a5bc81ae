import { z } from "zod";

export const configSchema = z.object({
  DATABASE_PATH: z.string().trim().min(1).default("books.db"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().trim().min(1).default("0.0.0.0"),
});

export type Config = {
  databasePath: string;
  port: number;
  host: string;
};

/**
 * Reads server settings from environment variables.
 * Unset or empty variables fall back to their defaults.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  const result = configSchema.safeParse({
    DATABASE_PATH: env.DATABASE_PATH || undefined,
    PORT: env.PORT || undefined,
    HOST: env.HOST || undefined,
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    databasePath: result.data.DATABASE_PATH,
    port: result.data.PORT,
    host: result.data.HOST,
  };
}

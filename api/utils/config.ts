import { z } from "zod";

const envSchema = z.object({
  EXPLORER_DB_PATH: z.string().trim().min(1).default("explorer.db"),
  EXPLORER_MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(50 * 1024 * 1024)
});

export type ExplorerConfig = {
  dbPath: string;
  maxUploadBytes: number;
};

export const parseConfig = (env: Record<string, string | undefined>): ExplorerConfig => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid explorer configuration: ${issues}`);
  }
  return {
    dbPath: result.data.EXPLORER_DB_PATH,
    maxUploadBytes: result.data.EXPLORER_MAX_UPLOAD_BYTES
  };
};

let cachedConfig: ExplorerConfig | null = null;

export const loadConfig = (): ExplorerConfig => {
  if (!cachedConfig) {
    cachedConfig = parseConfig(process.env);
  }
  return cachedConfig;
};

export const resetConfig = () => {
  cachedConfig = null;
};

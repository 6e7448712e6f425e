import { config as loadDotenv } from "dotenv";
import { z } from "zod";

loadDotenv();

const intFromEnv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((v) => /^\d+$/.test(v.trim()), { message: "must be a non-negative integer" })
    .transform((v) => parseInt(v, 10));

const schema = z.object({
  DATABASE_PATH: z.string().min(1).default("website_content.db"),
  STALENESS_WINDOW_MINUTES: intFromEnv("60"),
  FETCH_TIMEOUT_MS: intFromEnv("0"),
  USER_AGENT: z.string().optional(),
  CRON_SCHEDULE: z.string().optional(),
  DIFF_COLOR: z.enum(["auto", "always", "never"]).default("auto"),
});

export type AppConfig = z.infer<typeof schema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`Invalid configuration: ${errs}`);
  }
  return parsed.data;
}

export function useColor(setting: AppConfig["DIFF_COLOR"], isTTY: boolean): boolean {
  if (setting === "always") return true;
  if (setting === "never") return false;
  return isTTY;
}

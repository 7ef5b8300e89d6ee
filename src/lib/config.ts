import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_STYLE_DIR = resolve(__dirname, "../../styles");

export type LogLevel = "quiet" | "normal" | "verbose";

export interface Config {
  styleDir: string;
  logLevel: LogLevel;
}

const envSchema = z.object({
  STYLE_DIR: z.string().trim().min(1).optional(),
  STYLE_LOG: z.enum(["quiet", "normal", "verbose"]).default("normal"),
});

export function readConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${problems}`);
  }
  return {
    styleDir: parsed.data.STYLE_DIR ? resolve(parsed.data.STYLE_DIR) : DEFAULT_STYLE_DIR,
    logLevel: parsed.data.STYLE_LOG,
  };
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig) return cachedConfig;
  cachedConfig = readConfig();
  return cachedConfig;
}

/** Drop the cached config so the next getConfig() re-reads the environment. */
export function resetConfig(): void {
  cachedConfig = null;
}

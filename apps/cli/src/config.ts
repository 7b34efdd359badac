import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const repoRoot = path.resolve(__dirname, "../../..");
dotenv.config({ path: path.join(repoRoot, ".env"), override: true });
dotenv.config({ override: true });

export const DEFAULT_DATA_DIR = path.resolve(__dirname, "../data");

const FeatureFlag = z.preprocess((value) => {
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "y", "on"].includes(normalized)) return true;
    if (["0", "false", "no", "n", "off", ""].includes(normalized)) return false;
  }
  return value;
}, z.boolean());

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof LogLevel>;

export const Env = z
  .object({
    RELICFORGE_DEBUG: FeatureFlag.default(false),
    RELICFORGE_LOG_LEVEL: LogLevel.default("info"),
    RELICFORGE_DATA_DIR: z.string().min(1).default(DEFAULT_DATA_DIR),
    RELICFORGE_SEED: z.coerce.number().int().optional()
  })
  .passthrough();

export type Env = z.infer<typeof Env>;

export const env: Env = Env.parse(process.env);

/** The debug flag wins over an explicit level. */
export function logLevel(config: Pick<Env, "RELICFORGE_DEBUG" | "RELICFORGE_LOG_LEVEL">): LogLevel {
  return config.RELICFORGE_DEBUG ? "debug" : config.RELICFORGE_LOG_LEVEL;
}

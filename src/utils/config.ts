import { resolve } from "node:path";
import { z } from "zod";
import type { NetpolLensConfig } from "../types.js";

const DEFAULTS = {
  dataDir: "./data",
  logLevel: "info",
  resources: "on",
} as const;

const envSchema = z.object({
  NETPOL_LENS_DATA_DIR: z.string().min(1).default(DEFAULTS.dataDir),
  NETPOL_LENS_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error", "silent"])
    .default(DEFAULTS.logLevel),
  NETPOL_LENS_RESOURCES: z.enum(["on", "off"]).default(DEFAULTS.resources),
});

export type ConfigOverrides = Partial<NetpolLensConfig>;

/**
 * Build the runtime config from environment variables, applying defaults.
 * Explicit overrides (CLI flags) win over the environment. The data
 * directory is resolved against `cwd`.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd(),
): NetpolLensConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join(", ");
    throw new Error(`CONFIG_VALIDATION_FAILED: ${errors}`);
  }

  const parsed = result.data;
  return {
    dataDir: resolve(cwd, overrides.dataDir ?? parsed.NETPOL_LENS_DATA_DIR),
    logLevel: overrides.logLevel ?? parsed.NETPOL_LENS_LOG_LEVEL,
    resources: overrides.resources ?? parsed.NETPOL_LENS_RESOURCES,
  };
}

import { z } from "zod";
import { EngineError } from "./errors";
import { DEFAULT_SEPARATOR } from "./tokenizer";

export const EngineConfigSchema = z.object({
  separator: z
    .string()
    .length(1, "separator must be a single character")
    .refine((s) => s.trim() === s, "separator must not be whitespace")
    .default(DEFAULT_SEPARATOR),
  threshold: z.number().int().min(1).default(2),
  undoOnDelete: z.boolean().default(true),
  maxResults: z.number().int().positive().optional(),
  logLevel: z.enum(["error", "warn", "info", "debug", "silent"]).default("warn")
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.LISTEDIT_SEPARATOR !== undefined) out.separator = env.LISTEDIT_SEPARATOR;
  if (env.LISTEDIT_THRESHOLD !== undefined) {
    const n = Number(env.LISTEDIT_THRESHOLD);
    out.threshold = Number.isFinite(n) ? n : env.LISTEDIT_THRESHOLD;
  }
  if (env.LISTEDIT_LOG_LEVEL !== undefined) out.logLevel = env.LISTEDIT_LOG_LEVEL;
  return out;
}

/** Defaults, then environment, then explicit overrides. */
export function loadConfig(overrides: EngineConfigInput = {}, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EngineConfigSchema.safeParse({ ...fromEnv(env), ...overrides });
  if (!parsed.success) {
    throw EngineError.invalidConfig(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  BODY_LIMIT: z.string().min(1).default("15mb"),
  MAX_COUNT: z.coerce.number().int().positive().default(1000),
  DEFAULT_BUNDLE_SIZE: z.coerce.number().int().positive().default(100),
  GENERATOR_SEED: z.coerce.number().int().nonnegative().optional(),
});

export type Config = {
  port: number;
  bodyLimit: string;
  maxCount: number;
  defaultBundleSize: number;
  fixedSeed?: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // empty strings count as unset
  const raw = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${detail}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    bodyLimit: e.BODY_LIMIT,
    maxCount: e.MAX_COUNT,
    defaultBundleSize: e.DEFAULT_BUNDLE_SIZE,
    fixedSeed: e.GENERATOR_SEED,
  };
}

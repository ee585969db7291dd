import "dotenv/config";
import { z } from "zod";
import { MAX_RAND_SIZE } from "@uxid/core";

const EnvSchema = z.object({
  GATEWAY_PORT: z.coerce.number().int().positive().default(8787),
  GATEWAY_HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  UXID_DEFAULT_RAND_SIZE: z.coerce.number().int().positive().max(MAX_RAND_SIZE).default(10),
  UXID_MAX_COUNT: z.coerce.number().int().positive().default(100)
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid environment:\n${msg}`);
  }
  return parsed.data;
}

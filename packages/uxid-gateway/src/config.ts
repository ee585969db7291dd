import { createHash } from "node:crypto";
import { z } from "zod";
import { MAX_RAND_SIZE } from "@uxid/core";
import type { Env } from "./env.js";

export const GatewayConfigSchema = z.object({
  http: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1)
  }),
  log: z.object({
    level: z.string().min(1)
  }),
  uxid: z.object({
    defaultRandSize: z.number().int().positive().max(MAX_RAND_SIZE),
    // upper bound on ids per generate request
    maxCount: z.number().int().positive()
  })
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

export function configFromEnv(env: Env): GatewayConfig {
  return GatewayConfigSchema.parse({
    http: { port: env.GATEWAY_PORT, host: env.GATEWAY_HOST },
    log: { level: env.LOG_LEVEL },
    uxid: { defaultRandSize: env.UXID_DEFAULT_RAND_SIZE, maxCount: env.UXID_MAX_COUNT }
  });
}

export function configHash(cfg: GatewayConfig) {
  return createHash("sha256").update(JSON.stringify(cfg)).digest("hex").slice(0, 12);
}

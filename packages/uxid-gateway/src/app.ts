import Fastify, { type FastifyInstance } from "fastify";
import { createUxid, type UxidServices } from "@uxid/core";
import type { GatewayConfig } from "./config.js";
import { registerHealth } from "./routes/health.js";
import { registerUxids } from "./routes/uxids.js";

export interface AppDeps {
  cfg: GatewayConfig;
  /** Clock and random source override, for tests */
  services?: UxidServices;
  logger?: boolean;
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: deps.logger === false ? false : { level: deps.cfg.log.level } });

  const uxid = createUxid({ services: deps.services, defaultRandSize: deps.cfg.uxid.defaultRandSize });

  await registerHealth(app, { uxid });
  await registerUxids(app, { cfg: deps.cfg, uxid });

  return app;
}

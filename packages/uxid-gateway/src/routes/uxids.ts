import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { MAX_RAND_SIZE, isUxidSize, type UxidError, type UxidFacade, type UxidSize } from "@uxid/core";
import type { GatewayConfig } from "../config.js";

const Params = z.object({
  uxid: z.string().min(1)
});

function errorBody(error: UxidError) {
  return { error: error.code.toLowerCase(), message: error.message };
}

export async function registerUxids(app: FastifyInstance, deps: { cfg: GatewayConfig; uxid: UxidFacade }) {
  // prefix, time and the randSize floor are checked by the codec so its error codes reach the client;
  // the randSize ceiling is enforced here too, before any bytes are drawn
  const GenerateBody = z.object({
    prefix: z.string().optional(),
    size: z.custom<UxidSize>(isUxidSize, { message: "unknown size preset" }).optional(),
    randSize: z.number().max(MAX_RAND_SIZE).optional(),
    time: z.number().optional(),
    count: z.number().int().positive().max(deps.cfg.uxid.maxCount).default(1)
  });

  app.post("/v1/uxids", async (req, reply) => {
    const parsed = GenerateBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      reply.code(400);
      return { error: "invalid_body", issues: parsed.error.issues };
    }

    const { count, ...options } = parsed.data;
    const uxids: string[] = [];
    for (let i = 0; i < count; i++) {
      const result = deps.uxid.generate(options);
      if (!result.success) {
        reply.code(400);
        return errorBody(result.error);
      }
      uxids.push(result.data);
    }

    req.log.debug({ count, prefix: options.prefix ?? null }, "uxids_generated");
    return { uxids };
  });

  app.get("/v1/uxids/:uxid", async (req, reply) => {
    const params = Params.safeParse(req.params);
    if (!params.success) {
      reply.code(400);
      return { error: "invalid_params", issues: params.error.issues };
    }

    const result = deps.uxid.decode(params.data.uxid);
    if (!result.success) {
      reply.code(400);
      return errorBody(result.error);
    }

    return {
      uxid: {
        ...result.data,
        timestamp: new Date(result.data.time).toISOString()
      }
    };
  });
}

import type { FastifyInstance } from "fastify";
import type { UxidFacade } from "@uxid/core";

/** Reports ok once the codec round-trips an id it just generated. */
export async function registerHealth(app: FastifyInstance, deps: { uxid: UxidFacade }) {
  app.get("/health", async (_req, reply) => {
    const generated = deps.uxid.generate({ size: "xs" });
    const decoded = generated.success ? deps.uxid.decode(generated.data) : generated;
    if (!decoded.success) {
      app.log.error({ err: decoded.error }, "uxid codec check failed");
      reply.code(503);
      return { ok: false, error: decoded.error.code.toLowerCase() };
    }
    return { ok: true, time: decoded.data.time };
  });
}

import { loadEnv } from "./env.js";
import { configFromEnv, configHash } from "./config.js";
import { buildApp } from "./app.js";

async function main() {
  const env = loadEnv();
  const cfg = configFromEnv(env);

  const app = await buildApp({ cfg });

  app.log.info({ config: { hash: configHash(cfg), ...cfg } }, "gateway_config");

  await app.listen({ port: cfg.http.port, host: cfg.http.host });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});

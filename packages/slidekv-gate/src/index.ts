import { loadConfig } from "./config.js";
import { buildServer, storeKindOf } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const app = await buildServer(config);
  await app.listen({ host: config.host, port: config.port });
  app.log.info(
    {
      namespace: config.namespace,
      store: storeKindOf(config),
      rules: config.rules,
      storeFailureMode: config.storeFailureMode,
    },
    "rate limit gate ready",
  );
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

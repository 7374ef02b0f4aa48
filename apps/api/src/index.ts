import "dotenv/config";
import { FreshworksClient } from "@crm-relay/freshworks";
import { createLogger, loadEnv } from "@crm-relay/shared";
import { createServer } from "./server.js";

const env = loadEnv();
const logger = createLogger(env.logLevel);
const freshworks = new FreshworksClient({
  domain: env.freshworksDomain,
  apiKey: env.freshworksApiKey,
  contactsViewId: env.contactsViewId,
  dealsViewId: env.dealsViewId,
  timeoutMs: env.requestTimeoutMs,
  logger
});

const app = await createServer({ env, freshworks, logger });

const port = Number(process.env.PORT ?? 3000);
await app.listen({ port, host: "0.0.0.0" });
logger.info({ port, domain: env.freshworksDomain }, "API server started");

const shutdown = async () => {
  await app.close();
  process.exit(0);
};

const onSignal = () => {
  shutdown().catch((error: unknown) => {
    logger.error({ err: error instanceof Error ? error.message : String(error) }, "Shutdown failed");
    process.exit(1);
  });
};

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

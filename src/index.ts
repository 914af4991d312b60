import { buildApp, createScoringServices } from "./server.js";
import { ModelUnavailableError } from "./infra/app-error.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";

const config = loadRuntimeConfig();
const logger = createLogger(config.logLevel);

try {
  const services = await createScoringServices(config, { logger });
  const app = buildApp(config, services);
  await app.listen({ port: config.port, host: config.host });
  logger.info({ host: config.host, port: config.port }, "Fraud scoring API listening");
} catch (error) {
  if (error instanceof ModelUnavailableError) {
    logger.fatal({ err: error }, "Model artifacts unavailable; refusing to start");
  } else {
    logger.fatal({ err: error }, "Fraud scoring API failed to start");
  }
  process.exit(1);
}

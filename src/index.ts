import "dotenv/config";
import express from "express";
import { createAgentServices } from "./agent";
import { loadConfig } from "./config";
import { HttpIngressAdapter } from "./ingress/http";
import { createLogger } from "./logger";
import { SchemaConfigurationError } from "./schema/schemaLoader";

const config = loadConfig();
const logger = createLogger("searchops", config.logLevel);

async function startServer(): Promise<void> {
  try {
    const services = createAgentServices(config, logger);
    logger.info(`Tool catalogue ready: ${services.registry.listNames().join(", ")}`);

    const app = express();
    app.use(express.json({ limit: "1mb" }));
    new HttpIngressAdapter().register(app, services);

    app.listen(config.port, () => {
      logger.info(`Ingress listening on :${config.port}`);
    });
  } catch (error) {
    if (error instanceof SchemaConfigurationError) {
      logger.error(`Invalid tool schema configuration: ${error.message}`);
    } else {
      logger.error("Failed to start server:", error);
    }
    process.exit(1);
  }
}

void startServer();

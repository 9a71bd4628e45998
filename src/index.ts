import { createApp, createServices } from "./app";
import {
  configurationWarnings,
  describeConfig,
  loadConfigFromEnvironment,
} from "./infrastructure/config/app.config";

async function main() {
  try {
    const config = loadConfigFromEnvironment();

    for (const line of describeConfig(config)) {
      console.log(`[Config] ${line}`);
    }
    for (const warning of configurationWarnings(config, process.env)) {
      console.warn(`[Config] Warning: ${warning}`);
    }

    const services = createServices(config);
    const app = createApp(services, config);

    const server = app.listen(config.server.port, config.server.host, () => {
      console.log(`File vector service running on ${config.server.host}:${config.server.port}`);
      console.log(`Health check: http://localhost:${config.server.port}/health`);
    });

    const shutdown = (signal: string) => {
      console.log(`${signal} received, shutting down gracefully`);
      server.close(() => process.exit(0));
    };
    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
}

void main();

import { ConfigError, loadHttpServerConfig } from "./config.js";
import { createJsonLogger } from "../../infra/observability/logger.js";
import { createDefaultZenHttpServer } from "./server.js";

function loadConfigOrExit() {
  try {
    return loadHttpServerConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(JSON.stringify({ level: "error", event: "config_invalid", key: error.key, message: error.message }));
      process.exit(1);
    }
    throw error;
  }
}

const config = loadConfigOrExit();
const logger = createJsonLogger({ level: config.logLevel, maskEmails: config.maskEmails });
const server = createDefaultZenHttpServer(config, logger);

server.listen(config.port, () => {
  logger.info("server_listening", {
    port: config.port,
    api_url: config.apiUrl,
    frontend_url: config.frontendUrl,
  });
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    logger.info("server_stopping", { signal });
    server.close((error) => {
      if (error) {
        logger.error("server_close_failed", { error });
        process.exitCode = 1;
      }
    });
  });
}

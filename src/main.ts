#!/usr/bin/env node
import "dotenv/config";
import { hasBackendCredentials, resolveConfig } from "./config.js";
import { createLogger, setLogLevel } from "./logger.js";
import { createBackendBridge } from "./backend/backend-bridge.js";
import { SessionManager } from "./session/session-manager.js";
import { VoiceGatewayServer } from "./server/gateway-server.js";

async function main(): Promise<void> {
  const config = resolveConfig();
  setLogLevel(config.logLevel);
  const logger = createLogger({ component: "main" });

  if (!hasBackendCredentials(config)) {
    logger.fatal("OPENAI_API_KEY is not set; the backend cannot start");
    process.exitCode = 1;
    return;
  }

  const backend = await createBackendBridge(config.backend);
  const manager = new SessionManager({
    config,
    backend,
    logger: createLogger({ component: "session-manager" }),
  });
  const server = new VoiceGatewayServer({ config: config.server, manager });

  await server.listen();
  logger.info({ backend: backend.id }, "Voice gateway started");

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "Error during shutdown");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  createLogger({ component: "main" }).fatal({ err }, "Voice gateway failed to start");
  process.exit(1);
});

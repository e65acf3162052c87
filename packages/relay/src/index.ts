import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createProxyServer } from "./server.js";

const config = loadConfig();

const logger = createLogger(config.logging);

logger.info(
  {
    host: config.host,
    port: config.port,
    upstream: config.upstream ?? "(from request)",
    logFile: config.logging.logToFile
      ? `${config.logging.logDir}/${config.logging.logFile}`
      : "disabled",
  },
  "Starting WebSocket intercepting proxy",
);

const proxy = await createProxyServer({
  port: config.port,
  host: config.host,
  upstream: config.upstream,
  pollIntervalMs: config.pollIntervalMs,
  connectTimeoutMs: config.connectTimeoutMs,
  maxFramePayload: config.maxFramePayload,
  logger,
});

// Graceful shutdown
let shuttingDown = false;
function shutdown() {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("Shutting down proxy...");

  // Sessions poll their shutdown signal; force exit if any is stuck in a read
  const forceExitTimeout = setTimeout(() => {
    logger.warn("Force exiting after timeout");
    process.exit(0);
  }, config.pollIntervalMs + 2000);

  proxy.close().then(
    () => {
      clearTimeout(forceExitTimeout);
      logger.info("Proxy stopped");
      process.exit(0);
    },
    (err: unknown) => {
      logger.error({ err }, "Error while shutting down");
      process.exit(1);
    },
  );
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

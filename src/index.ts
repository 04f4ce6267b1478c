// Tendon Stiffness Analyzer - Entry point
// Loads configuration, wires the session manager and starts the server.

import "dotenv/config";
import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import { FilePersistence } from "./file-persistence.js";
import { createConsoleLogger } from "./logger.js";
import { createAppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";

export const APP_NAME = "Tendon Stiffness Analyzer";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  logFatal(err instanceof ConfigError ? `${err.message}. Fix it in your .env file.` : String(err));
  process.exit(1);
}

logInit(`Feed: ${config.feed.distalFile}, ${config.feed.proximalFile} (swap columns: ${config.feed.swapColumns})`);
if (config.kalman.accelerationGateThreshold <= 0) {
  logInit("Kalman acceleration gating disabled");
}

// ─── Wire components ────────────────────────────────────────────────────────────

logInit(`Initializing FilePersistence (${config.outputDir}/)...`);
const filePersistence = new FilePersistence(config.outputDir);

logInit("Wiring SessionManager...");
const sessionManager = new SessionManager({
  settings: config,
  filePersistence,
  logger: createConsoleLogger("SessionManager"),
});

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({ sessionManager, logger: createConsoleLogger("Server") });

server
  .listen(config.port)
  .then(() => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit("Pipeline: coordinate feed → Kalman → anomaly review → corrections → calibration → stiffness");
  })
  .catch((err: unknown) => {
    logFatal(`Server failed to start: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });

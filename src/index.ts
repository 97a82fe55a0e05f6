// Speech Segmentation Service - Entry point
// Loads configuration and starts the server.

import "dotenv/config";
import { APP_NAME, APP_VERSION, loadAppConfig, type AppConfig } from "./config.js";
import { createAppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let appConfig: AppConfig;
try {
  appConfig = loadAppConfig();
} catch (err) {
  logFatal(`Invalid configuration: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

const { port, timing, statusIntervalMs } = appConfig;
logInit(
  `Segmentation defaults: ${timing.sampleRate}Hz, threshold=${timing.threshold}, ` +
    `silence=${timing.minSilenceDurationMs}ms, speech=${timing.minSpeechDurationMs}ms, ` +
    `pad=${timing.speechPadMs}ms, frame=${timing.frameMs}ms`,
);

// ─── Create SessionManager ──────────────────────────────────────────────────────

// No scorer is wired here: clients send probabilities computed on their side.
// Pass `scorerFactory` to accept raw PCM audio frames as well.
const sessionManager = new SessionManager({ defaultTiming: timing, statusIntervalMs });

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({ sessionManager, defaultTiming: timing });

server
  .listen(port)
  .then(() => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
    logInit("Ready for connections");
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });

// Speech Segmentation Service - WebSocket Handler and Express Server
//
// Each WebSocket connection owns exactly one session, and each streaming
// session owns exactly one engine. Frames of one connection are handled in
// arrival order, so events go out in frame order.
//
// Privacy: audio is scored and dropped frame by frame; nothing is buffered
// beyond one frame and nothing is written to disk.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import WebSocket, { WebSocketServer } from "ws";
import { SessionManager } from "./session-manager.js";
import { parseClientMessage, type ClientMessage } from "./protocol.js";
import { decodeAudioFrame, decodeProbabilityFrame, getFrameType } from "./frame-codec.js";
import {
  DEFAULT_TIMING_OPTIONS,
  configFromTiming,
  type SegmenterTimingOptions,
} from "./segmenter-config.js";
import type { SegmentationCallbacks } from "./segmentation-stream.js";
import { SessionState, type ServerLogger, type ServerMessage } from "./types.js";
import { samplesToSeconds } from "./utils.js";

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  sessionId: string;
  /** Sample rate of the running stream, for offset → seconds conversion */
  sampleRate: number;
  /** Highest binary frame seq seen in this stream, or null before the first */
  lastSeq: number | null;
}

// ─── Logging ────────────────────────────────────────────────────────────────────

export type { ServerLogger };

const defaultLogger: ServerLogger = {
  info: (msg, ...args) => console.log(`[INFO] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[WARN] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[ERROR] ${msg}`, ...args),
};

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Custom logger. Defaults to console-based logger. */
  logger?: ServerLogger;
  /** Externally provided SessionManager (for testing). Created internally if omitted. */
  sessionManager?: SessionManager;
  /** Timing new sessions start with; reported by GET /config/defaults */
  defaultTiming?: SegmenterTimingOptions;
  /** Wall-clock interval between status messages for internally created sessions */
  statusIntervalMs?: number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const {
    logger = defaultLogger,
    defaultTiming = DEFAULT_TIMING_OPTIONS,
    statusIntervalMs,
  } = options;
  const sessionManager =
    options.sessionManager ?? new SessionManager({ defaultTiming, statusIntervalMs });

  const app = express();
  const httpServer = createServer(app);

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Defaults new sessions start with, plus the sample counts they resolve to
  app.get("/config/defaults", (_req, res) => {
    const { config, frameSize } = configFromTiming(defaultTiming);
    res.json({ timing: defaultTiming, config, frameSize });
  });

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, sessionManager, logger);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  const session = sessionManager.createSession();

  const connState: ConnectionState = {
    sessionId: session.id,
    sampleRate: session.timing.sampleRate,
    lastSeq: null,
  };

  logger.info(`New WebSocket connection, session ${session.id}`);

  sendMessage(ws, { type: "stream_state", state: session.state, sessionId: session.id });

  ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        handleBinaryMessage(ws, toBuffer(data), connState, sessionManager, logger);
      } else {
        const message = parseClientMessage(toBuffer(data).toString("utf-8"));
        handleClientMessage(ws, message, connState, sessionManager, logger);
      }
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Error handling message for session ${connState.sessionId}: ${errorMessage}`);
      sendMessage(ws, {
        type: "error",
        message: errorMessage,
        recoverable: true,
      });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${connState.sessionId}`);
    sessionManager.removeSession(connState.sessionId);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${connState.sessionId}: ${err.message}`);
    sessionManager.removeSession(connState.sessionId);
  });
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ─── Binary Message Handler (SG frames) ─────────────────────────────────────────

function handleBinaryMessage(
  ws: WebSocket,
  data: Buffer,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  const frameType = getFrameType(data);

  let seq: number;
  if (frameType === "probability") {
    const header = decodeProbabilityFrame(data);
    if (!header) throw new Error("Malformed probability frame");
    seq = header.seq;
    warnOnSeqGap(seq, connState, logger);
    sessionManager.feedProbability(connState.sessionId, header.probability, header.samples);
  } else if (frameType === "audio") {
    const frame = decodeAudioFrame(data);
    if (!frame) throw new Error("Malformed audio frame");
    seq = frame.header.seq;
    warnOnSeqGap(seq, connState, logger);
    sessionManager.feedAudio(connState.sessionId, frame.pcmBuffer);
  } else {
    sendMessage(ws, {
      type: "error",
      message: "Binary messages must be SG-prefixed probability or audio frames.",
      recoverable: true,
    });
    return;
  }

  connState.lastSeq = seq;
}

/**
 * Frames are processed as they arrive; a gap or reordering in `seq` only means
 * the client lost or reordered frames, so it is logged, not rejected.
 */
function warnOnSeqGap(seq: number, connState: ConnectionState, logger: ServerLogger): void {
  if (connState.lastSeq !== null && seq !== connState.lastSeq + 1) {
    logger.warn(
      `Frame seq ${seq} does not follow ${connState.lastSeq} (session ${connState.sessionId})`,
    );
  }
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  switch (message.type) {
    case "configure": {
      const { frameSize } = sessionManager.configure(connState.sessionId, message.options);
      const session = sessionManager.getSession(connState.sessionId);
      sendMessage(ws, { type: "config_applied", timing: session.timing, frameSize });
      break;
    }

    case "start_stream":
      handleStartStream(ws, connState, sessionManager, logger);
      break;

    case "frame":
      sessionManager.feedProbability(connState.sessionId, message.probability, message.samples);
      break;

    case "reset":
      sessionManager.resetStream(connState.sessionId);
      connState.lastSeq = null;
      sendMessage(ws, {
        type: "stream_state",
        state: SessionState.STREAMING,
        sessionId: connState.sessionId,
      });
      break;

    case "stop_stream": {
      const summary = sessionManager.stopStream(connState.sessionId);
      logger.info(`Stream stopped for session ${connState.sessionId}`);
      sendMessage(ws, { type: "stream_summary", summary });
      sendMessage(ws, {
        type: "stream_state",
        state: SessionState.IDLE,
        sessionId: connState.sessionId,
      });
      break;
    }

    default: {
      const exhaustiveCheck: never = message;
      throw new Error(`Unhandled message: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

// ─── Start Stream ───────────────────────────────────────────────────────────────

function handleStartStream(
  ws: WebSocket,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  const session = sessionManager.getSession(connState.sessionId);
  connState.sampleRate = session.timing.sampleRate;
  connState.lastSeq = null;

  // Callbacks are dropped by stopStream(), so each stream registers its own
  sessionManager.registerCallbacks(connState.sessionId, createStreamCallbacks(ws, connState));
  sessionManager.startStream(connState.sessionId);
  logger.info(`Stream started for session ${connState.sessionId}`);

  sendMessage(ws, {
    type: "stream_state",
    state: SessionState.STREAMING,
    sessionId: connState.sessionId,
  });
}

/**
 * Event sink for one connection: forwards engine events with offsets in both
 * samples and seconds.
 */
function createStreamCallbacks(
  ws: WebSocket,
  connState: ConnectionState,
): Partial<SegmentationCallbacks> {
  return {
    onSpeechStart: (event) => {
      sendMessage(ws, {
        type: "speech_start",
        offsetSamples: event.offsetSamples,
        offsetSeconds: samplesToSeconds(event.offsetSamples, connState.sampleRate),
      });
    },
    onSpeechEnd: (event, segment) => {
      sendMessage(ws, {
        type: "speech_end",
        offsetSamples: event.offsetSamples,
        offsetSeconds: samplesToSeconds(event.offsetSamples, connState.sampleRate),
        segment,
      });
    },
    onSegmentDiscarded: (startSample) => {
      sendMessage(ws, { type: "segment_discarded", startSample });
    },
    onStatus: (status) => {
      sendMessage(ws, { type: "status", probability: status.probability, speaking: status.speaking });
    },
  };
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

/**
 * Send a typed JSON message if the socket is still open.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

export type { ConnectionState };

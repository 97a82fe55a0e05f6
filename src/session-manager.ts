// Speech Segmentation Service - Session Manager
// Owns one SegmentationStream per session. Streams are never shared: concurrent
// audio streams scale by getting their own engine, not by locking one.
//
// Session lifecycle:
//   IDLE → STREAMING:  startStream()
//   STREAMING → IDLE:  stopStream()
//   resetStream() starts a new logical stream without leaving STREAMING.

import { v4 as uuidv4 } from "uuid";
import { SessionState } from "./types.js";
import type { Session, StreamSummary } from "./types.js";
import {
  DEFAULT_TIMING_OPTIONS,
  assertSupportedSampleRate,
  configFromTiming,
} from "./segmenter-config.js";
import type { ResolvedTiming, SegmenterTimingOptions } from "./segmenter-config.js";
import { SegmentationStream } from "./segmentation-stream.js";
import type {
  ProbabilityScorer,
  SegmentationCallbacks,
  SegmentationStreamDeps,
  SegmentationStreamOptions,
} from "./segmentation-stream.js";
import type { SegmentEvent } from "./speech-segmenter.js";

/** Default wall-clock interval between status callbacks */
const DEFAULT_STATUS_INTERVAL_MS = 100;

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  streamFactory?: (
    options: SegmentationStreamOptions,
    deps: SegmentationStreamDeps,
  ) => SegmentationStream;
  /** Builds the probability scorer for a new stream. Without one, only probability frames are accepted. */
  scorerFactory?: (sampleRate: number) => ProbabilityScorer;
  /** Timing every new session starts with */
  defaultTiming?: SegmenterTimingOptions;
  statusIntervalMs?: number;
}

/**
 * Valid state transitions for the session state machine.
 *
 * IDLE → STREAMING:  startStream()
 * STREAMING → IDLE:  stopStream()
 */
const VALID_TRANSITIONS: ReadonlyMap<SessionState, SessionState> = new Map([
  [SessionState.IDLE, SessionState.STREAMING],
  [SessionState.STREAMING, SessionState.IDLE],
]);

export class SessionManager {
  private sessions: Map<string, Session> = new Map();
  private streams: Map<string, SegmentationStream> = new Map();
  private callbacksMap: Map<string, Partial<SegmentationCallbacks>> = new Map();
  private readonly deps: SessionManagerDeps;
  private readonly defaultTiming: SegmenterTimingOptions;

  private log(level: string, msg: string): void {
    console.log(`[${level}] [SessionManager] ${msg}`);
  }

  constructor(deps: SessionManagerDeps = {}) {
    this.deps = deps;
    this.defaultTiming = { ...(deps.defaultTiming ?? DEFAULT_TIMING_OPTIONS) };
    // Fail at start-up rather than on the first stream
    configFromTiming(this.defaultTiming);
    this.log("INIT", `Scorer: ${deps.scorerFactory ? "enabled (factory provided)" : "disabled (probability frames only)"}`);
  }

  /**
   * Creates a new session in the IDLE state with the default timing.
   */
  createSession(): Session {
    const session: Session = {
      id: uuidv4(),
      state: SessionState.IDLE,
      timing: { ...this.defaultTiming },
      startedAt: null,
      stoppedAt: null,
      segments: [],
      resets: 0,
    };

    this.sessions.set(session.id, session);
    return session;
  }

  /**
   * Retrieves a session by ID.
   * @throws Error if the session does not exist.
   */
  getSession(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Session not found: ${sessionId}`);
    }
    return session;
  }

  /**
   * Merge timing overrides into the session's configuration. Only valid in
   * IDLE state; the merged result is validated before it is stored, so an
   * invalid override leaves the previous timing in place.
   *
   * @throws SegmenterConfigError if the merged options are invalid
   */
  configure(sessionId: string, overrides: Partial<SegmenterTimingOptions>): ResolvedTiming {
    const session = this.getSession(sessionId);

    if (session.state !== SessionState.IDLE) {
      throw new Error(
        `Cannot configure: session is in "${session.state}" state. ` +
          `Timing can only be changed while the session is in "idle" state.`,
      );
    }

    const timing: SegmenterTimingOptions = { ...session.timing, ...overrides };
    assertSupportedSampleRate(timing.sampleRate);
    const resolved = configFromTiming(timing);

    session.timing = timing;
    this.log(
      "INFO",
      `Timing set for session ${sessionId}: rate=${timing.sampleRate}Hz, threshold=${timing.threshold}, ` +
        `silence=${timing.minSilenceDurationMs}ms, speech=${timing.minSpeechDurationMs}ms, pad=${timing.speechPadMs}ms`,
    );
    return resolved;
  }

  /**
   * Register per-session callbacks. Called by the server layer BEFORE
   * startStream(); the stream picks them up when it is created.
   */
  registerCallbacks(sessionId: string, callbacks: Partial<SegmentationCallbacks>): void {
    this.getSession(sessionId);
    this.callbacksMap.set(sessionId, callbacks);
  }

  /**
   * IDLE → STREAMING. Builds a fresh engine from the session's timing.
   */
  startStream(sessionId: string): void {
    const session = this.getSession(sessionId);
    this.assertTransition(session, SessionState.STREAMING, "startStream");

    const { config, frameSize } = configFromTiming(session.timing);
    const registered = this.callbacksMap.get(sessionId) ?? {};

    const callbacks: Partial<SegmentationCallbacks> = {
      ...registered,
      onSpeechEnd: (event, segment) => {
        session.segments.push(segment);
        registered.onSpeechEnd?.(event, segment);
      },
    };

    const options: SegmentationStreamOptions = {
      config,
      frameSize,
      statusIntervalMs: this.deps.statusIntervalMs ?? DEFAULT_STATUS_INTERVAL_MS,
    };
    const streamDeps: SegmentationStreamDeps = {
      callbacks,
      scorer: this.deps.scorerFactory?.(config.sampleRate),
      logger: {
        info: (msg) => this.log("INFO", `${msg} (session ${sessionId})`),
        warn: (msg) => this.log("WARN", `${msg} (session ${sessionId})`),
        error: (msg) => this.log("ERROR", `${msg} (session ${sessionId})`),
      },
    };

    const stream = this.deps.streamFactory
      ? this.deps.streamFactory(options, streamDeps)
      : new SegmentationStream(options, streamDeps);

    this.streams.set(sessionId, stream);
    session.state = SessionState.STREAMING;
    session.startedAt = new Date();
    session.stoppedAt = null;
    session.segments = [];
    session.resets = 0;

    this.log("INFO", `Stream started for session ${sessionId} (frame=${frameSize} samples)`);
  }

  /**
   * Feed one frame's probability to the session's engine.
   * @throws Error if the session is not streaming
   * @throws FrameContractError if the probability or frame length is invalid
   */
  feedProbability(sessionId: string, probability: number, frameLengthSamples: number): SegmentEvent | null {
    return this.requireStream(sessionId, "feedProbability").feedProbability(probability, frameLengthSamples);
  }

  /**
   * Feed one chunk of 16-bit little-endian PCM. Requires a scorer.
   */
  feedAudio(sessionId: string, chunk: Buffer): SegmentEvent | null {
    return this.requireStream(sessionId, "feedAudio").feedPcm16(chunk);
  }

  /**
   * Begin a new logical stream on the same engine: offsets restart at zero
   * and completed segments are cleared. Timing is unchanged.
   */
  resetStream(sessionId: string): void {
    const stream = this.requireStream(sessionId, "resetStream");
    const session = this.getSession(sessionId);

    stream.reset();
    session.segments = [];
    session.resets++;
    this.log("INFO", `Stream reset for session ${sessionId} (reset #${session.resets})`);
  }

  /**
   * STREAMING → IDLE. Returns what the stream produced. An utterance that is
   * still open is reported through `speaking: true`, not as a segment.
   */
  stopStream(sessionId: string): StreamSummary {
    const session = this.getSession(sessionId);
    this.assertTransition(session, SessionState.IDLE, "stopStream");

    const stream = this.requireStream(sessionId, "stopStream");
    const summary = stream.summary();

    this.streams.delete(sessionId);
    this.callbacksMap.delete(sessionId);
    session.state = SessionState.IDLE;
    session.stoppedAt = new Date();

    this.log(
      "INFO",
      `Stream stopped for session ${sessionId}: ${summary.segments.length} segment(s), ${summary.secondsProcessed}s processed`,
    );
    return summary;
  }

  /**
   * Drop a session and its stream, whatever state it is in.
   */
  removeSession(sessionId: string): void {
    this.streams.delete(sessionId);
    this.callbacksMap.delete(sessionId);
    if (this.sessions.delete(sessionId)) {
      this.log("INFO", `Session ${sessionId} removed`);
    }
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  // ─── Private helpers ────────────────────────────────────────────────────────

  private requireStream(sessionId: string, methodName: string): SegmentationStream {
    const session = this.getSession(sessionId);
    const stream = this.streams.get(sessionId);
    if (session.state !== SessionState.STREAMING || !stream) {
      throw new Error(
        `Cannot call ${methodName}() in "${session.state}" state. ` +
          `Expected state: "${SessionState.STREAMING}".`,
      );
    }
    return stream;
  }

  /**
   * Throws a descriptive error if the transition is not allowed.
   */
  private assertTransition(
    session: Session,
    targetState: SessionState,
    methodName: string,
  ): void {
    const allowedTarget = VALID_TRANSITIONS.get(session.state);

    if (allowedTarget !== targetState) {
      throw new Error(
        `Invalid state transition: cannot call ${methodName}() in "${session.state}" state. ` +
          `Current state: "${session.state}".`,
      );
    }
  }
}

// Speech Segmentation Service - Shared TypeScript interfaces and types
// Runtime code stays out of this module; it is a type barrel plus the
// SessionState enum.

import type { SegmenterTimingOptions } from "./segmenter-config.js";

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionState {
  IDLE = "idle",
  STREAMING = "streaming",
}

// ─── Segments ───────────────────────────────────────────────────────────────────

/**
 * A completed utterance as seen by the event sink. Sample offsets are the
 * padded values reported by the engine; seconds are derived from them.
 */
export interface SpeechSegment {
  startSample: number;
  endSample: number;
  startSeconds: number;
  endSeconds: number;
  durationSeconds: number;
  /** Frames fed while the engine was speaking, the end frame included */
  frames: number;
}

export interface SegmentationStatus {
  /** Probability of the most recent frame */
  probability: number;
  /** Whether the engine is inside an utterance after that frame */
  speaking: boolean;
}

export interface StreamSummary {
  segments: SpeechSegment[];
  samplesProcessed: number;
  framesProcessed: number;
  secondsProcessed: number;
  /** True if the stream ended while an utterance was still open */
  speaking: boolean;
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface Session {
  id: string;
  state: SessionState;
  timing: SegmenterTimingOptions;
  startedAt: Date | null;
  stoppedAt: Date | null;
  /** Completed segments of the current (or last) stream */
  segments: SpeechSegment[];
  /** Times resetStream() started a new logical stream since startStream() */
  resets: number;
}

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface ServerLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// ─── Wire Frame Types ───────────────────────────────────────────────────────────

export type FrameType = "probability" | "audio";

export interface ProbabilityFrameHeader {
  seq: number;
  probability: number;
  /** Frame length in samples */
  samples: number;
}

export interface AudioFrameHeader {
  seq: number;
}

// ─── WebSocket Protocol Messages ────────────────────────────────────────────────

// Client → Server messages are defined by the zod schemas in protocol.ts

// Server → Client messages
export type ServerMessage =
  | { type: "stream_state"; state: SessionState; sessionId: string }
  | { type: "config_applied"; timing: SegmenterTimingOptions; frameSize: number }
  | { type: "speech_start"; offsetSamples: number; offsetSeconds: number }
  | {
      type: "speech_end";
      offsetSamples: number;
      offsetSeconds: number;
      segment: SpeechSegment;
    }
  | { type: "segment_discarded"; startSample: number }
  | { type: "status"; probability: number; speaking: boolean }
  | { type: "stream_summary"; summary: StreamSummary }
  | { type: "error"; message: string; recoverable: boolean };

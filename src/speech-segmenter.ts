// ─── Speech Segmenter ───────────────────────────────────────────────────────────
// Hysteresis-based voice activity segmentation over a stream of per-frame speech
// probabilities. Turns a jittery scalar stream into speech_start / speech_end
// events with sample-accurate offsets.

import { FrameContractError } from "./errors.js";
import type { SegmenterConfig } from "./segmenter-config.js";

// ─── Types ──────────────────────────────────────────────────────────────────────

export interface SpeechStartEvent {
  type: "speech_start";
  /** Start of speech in samples since the last reset, padding applied */
  offsetSamples: number;
}

export interface SpeechEndEvent {
  type: "speech_end";
  /** End of speech in samples since the last reset, padding applied */
  offsetSamples: number;
}

export type SegmentEvent = SpeechStartEvent | SpeechEndEvent;

export interface IdleState {
  phase: "idle";
}

export interface SpeakingState {
  phase: "speaking";
  /** `currentSample` at the frame that started speech (pre-padding) */
  startSample: number;
  /** Where the current run of silence-bearing frames began, or null if none is running */
  pendingSilenceSample: number | null;
}

export type SegmenterPhase = IdleState | SpeakingState;

/**
 * Everything the engine knows. `currentSample` is the only timeline; there is
 * no wall clock anywhere in here.
 */
export interface SegmenterSnapshot {
  readonly state: SegmenterPhase;
  /** Samples consumed since construction or the last reset */
  readonly currentSample: number;
  /** Last reported offset; later offsets are never reported below it */
  readonly lastOffset: number;
}

export interface TransitionResult {
  snapshot: SegmenterSnapshot;
  event: SegmentEvent | null;
}

export const INITIAL_SNAPSHOT: SegmenterSnapshot = Object.freeze({
  state: Object.freeze({ phase: "idle" as const }),
  currentSample: 0,
  lastOffset: 0,
});

// ─── Input contract ─────────────────────────────────────────────────────────────

/**
 * Throw unless `probability` is a finite number in [0, 1] and the frame length
 * is a positive integer. Bad probabilities are not clamped: a scorer emitting
 * them is broken and should be noticed.
 */
export function assertFrameContract(probability: number, frameLengthSamples: number): void {
  if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
    throw new FrameContractError(`probability must be in [0, 1], got ${probability}`);
  }
  if (!Number.isInteger(frameLengthSamples) || frameLengthSamples <= 0) {
    throw new FrameContractError(
      `frameLengthSamples must be a positive integer, got ${frameLengthSamples}`,
    );
  }
}

// ─── Transition functions ───────────────────────────────────────────────────────
// Each handles one condition of the per-frame update. They are pure: they take
// a snapshot and return a new one.

/** Move the timeline forward by one frame. */
export function advance(snapshot: SegmenterSnapshot, frameLengthSamples: number): SegmenterSnapshot {
  return { ...snapshot, currentSample: snapshot.currentSample + frameLengthSamples };
}

/**
 * Speech has reasserted itself before the silence timer matured: drop the
 * pending end. Only a frame at or above the speech threshold does this; a
 * frame inside the hysteresis band leaves the timer running.
 */
export function cancelPendingSilence(
  snapshot: SegmenterSnapshot,
  config: SegmenterConfig,
  probability: number,
): SegmenterSnapshot {
  const { state } = snapshot;
  if (
    probability >= config.speechThreshold &&
    state.phase === "speaking" &&
    state.pendingSilenceSample !== null
  ) {
    return { ...snapshot, state: { ...state, pendingSilenceSample: null } };
  }
  return snapshot;
}

/**
 * Idle → speaking on the first frame at or above the speech threshold.
 *
 * The reported offset is backdated by one frame length because
 * `currentSample` has already moved past the frame that triggered.
 * Returns null when the transition does not apply.
 */
export function tryStart(
  snapshot: SegmenterSnapshot,
  config: SegmenterConfig,
  probability: number,
  frameLengthSamples: number,
): TransitionResult | null {
  if (probability < config.speechThreshold || snapshot.state.phase !== "idle") {
    return null;
  }

  const raw = snapshot.currentSample - config.speechPadSamples - frameLengthSamples;
  const offsetSamples = Math.max(0, raw, snapshot.lastOffset);

  return {
    snapshot: {
      state: { phase: "speaking", startSample: snapshot.currentSample, pendingSilenceSample: null },
      currentSample: snapshot.currentSample,
      lastOffset: offsetSamples,
    },
    event: { type: "speech_start", offsetSamples },
  };
}

/**
 * Speaking and below the silence threshold: run the silence timer and, once
 * it matures, either confirm the end or drop the segment as too short.
 * Returns null when the frame is not silence-bearing or the engine is idle.
 */
export function evaluateEnd(
  snapshot: SegmenterSnapshot,
  config: SegmenterConfig,
  probability: number,
  frameLengthSamples: number,
): TransitionResult | null {
  const { state, currentSample } = snapshot;
  if (probability >= config.silenceThreshold || state.phase !== "speaking") {
    return null;
  }

  const pendingSilenceSample = state.pendingSilenceSample ?? currentSample;
  const silenceRun = currentSample - pendingSilenceSample;

  if (silenceRun < config.minSilenceDurationSamples) {
    return {
      snapshot: { ...snapshot, state: { ...state, pendingSilenceSample } },
      event: null,
    };
  }

  const speechRun = pendingSilenceSample - state.startSample;
  if (speechRun < config.minSpeechDurationSamples) {
    // A blip: its start never got enough speech behind it, so no end is reported
    return {
      snapshot: { ...snapshot, state: { phase: "idle" } },
      event: null,
    };
  }

  const raw = pendingSilenceSample + config.speechPadSamples - frameLengthSamples;
  const offsetSamples = Math.max(0, raw, snapshot.lastOffset);

  return {
    snapshot: { state: { phase: "idle" }, currentSample, lastOffset: offsetSamples },
    event: { type: "speech_end", offsetSamples },
  };
}

/**
 * Full per-frame update: validate, advance, cancel a pending end, then try the
 * start transition and the end evaluation in that order. At most one event
 * comes out, since a start needs idle and an end needs speaking.
 */
export function transition(
  snapshot: SegmenterSnapshot,
  config: SegmenterConfig,
  probability: number,
  frameLengthSamples: number,
): TransitionResult {
  assertFrameContract(probability, frameLengthSamples);

  let next = advance(snapshot, frameLengthSamples);
  next = cancelPendingSilence(next, config, probability);

  return (
    tryStart(next, config, probability, frameLengthSamples) ??
    evaluateEnd(next, config, probability, frameLengthSamples) ?? { snapshot: next, event: null }
  );
}

// ─── SpeechSegmenter ────────────────────────────────────────────────────────────

/**
 * Stateful wrapper around `transition`. One instance per audio stream; it is
 * not safe to interleave frames from two streams on the same instance.
 */
export class SpeechSegmenter {
  readonly config: SegmenterConfig;
  private current: SegmenterSnapshot;

  constructor(config: SegmenterConfig) {
    this.config = config;
    this.current = INITIAL_SNAPSHOT;
  }

  /**
   * Consume one frame's speech probability. Returns the event this frame
   * produced, if any.
   */
  process(probability: number, frameLengthSamples: number): SegmentEvent | null {
    const result = transition(this.current, this.config, probability, frameLengthSamples);
    this.current = result.snapshot;
    return result.event;
  }

  /** Forget everything about the current stream; configuration is kept. */
  reset(): void {
    this.current = INITIAL_SNAPSHOT;
  }

  get snapshot(): SegmenterSnapshot {
    return this.current;
  }

  get isSpeaking(): boolean {
    return this.current.state.phase === "speaking";
  }

  get currentSample(): number {
    return this.current.currentSample;
  }
}

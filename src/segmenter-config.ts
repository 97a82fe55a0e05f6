// Speech Segmentation Service - Engine configuration
//
// Two shapes of configuration exist:
//  - SegmenterConfig: what the engine consumes, all durations in samples.
//  - SegmenterTimingOptions: what people write (env vars, WebSocket
//    `configure` messages), durations in milliseconds.
// Both are validated here; an invalid value never reaches an engine.

import { SegmenterConfigError } from "./errors.js";
import { msToSamples } from "./utils.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Margin below the speech threshold used when no silence threshold is given */
export const SILENCE_THRESHOLD_MARGIN = 0.15;

/** Lower bound for a derived silence threshold */
export const MIN_DERIVED_SILENCE_THRESHOLD = 0.01;

/** Sample rates the service accepts (narrowband telephony and wideband) */
export const SUPPORTED_SAMPLE_RATES: readonly number[] = [8000, 16000];

// ─── Types ──────────────────────────────────────────────────────────────────────

/**
 * Immutable engine configuration. All durations are sample counts at
 * `sampleRate`.
 */
export interface SegmenterConfig {
  readonly sampleRate: number;
  /** Probability at or above which a frame counts as speech */
  readonly speechThreshold: number;
  /** Probability below which a frame counts as silence. Always < speechThreshold */
  readonly silenceThreshold: number;
  /** Contiguous silence required, once speaking, before an end is confirmed */
  readonly minSilenceDurationSamples: number;
  /** Minimum samples between a start and its candidate end */
  readonly minSpeechDurationSamples: number;
  /** Subtracted from reported starts, added to reported ends */
  readonly speechPadSamples: number;
}

/**
 * Input to `createSegmenterConfig`. Only the silence threshold is derived;
 * omitted durations default to zero.
 */
export interface SegmenterOptions {
  sampleRate: number;
  speechThreshold: number;
  silenceThreshold?: number;
  minSilenceDurationSamples?: number;
  minSpeechDurationSamples?: number;
  speechPadSamples?: number;
}

/**
 * Millisecond-based options, as configured per session or through env vars.
 */
export interface SegmenterTimingOptions {
  sampleRate: number;
  /** Speech threshold */
  threshold: number;
  /** Silence threshold. Derived from `threshold` when absent */
  negThreshold?: number;
  minSilenceDurationMs: number;
  minSpeechDurationMs: number;
  speechPadMs: number;
  /** Length of one scoring window. 32ms → 256 samples at 8kHz */
  frameMs: number;
}

export const DEFAULT_TIMING_OPTIONS: Readonly<SegmenterTimingOptions> = Object.freeze({
  sampleRate: 8000,
  threshold: 0.45,
  minSilenceDurationMs: 1000,
  minSpeechDurationMs: 250,
  speechPadMs: 100,
  frameMs: 32,
});

export interface ResolvedTiming {
  config: SegmenterConfig;
  /** Samples per scoring window */
  frameSize: number;
}

// ─── Validation helpers ─────────────────────────────────────────────────────────

function requireNonNegativeInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new SegmenterConfigError(
      `${field} must be a non-negative integer, got ${value}`,
      field,
    );
  }
}

function requireNonNegativeFinite(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new SegmenterConfigError(
      `${field} must be a non-negative number, got ${value}`,
      field,
    );
  }
}

/**
 * Silence threshold used when the caller gives none: a fixed hysteresis
 * margin under the speech threshold, kept away from zero.
 */
export function deriveSilenceThreshold(speechThreshold: number): number {
  return Math.max(speechThreshold - SILENCE_THRESHOLD_MARGIN, MIN_DERIVED_SILENCE_THRESHOLD);
}

/**
 * Samples per scoring window. Fractional samples are dropped.
 */
export function frameSizeFor(sampleRate: number, frameMs: number): number {
  return Math.floor((sampleRate * frameMs) / 1000);
}

// ─── createSegmenterConfig ──────────────────────────────────────────────────────

/**
 * Validate options and build a frozen engine configuration.
 *
 * Throws `SegmenterConfigError` naming the first offending field. Nothing is
 * clamped; the only value ever filled in is the derived silence threshold,
 * and a derived value that does not sit below the speech threshold is
 * rejected like an explicit one.
 */
export function createSegmenterConfig(options: SegmenterOptions): SegmenterConfig {
  const {
    sampleRate,
    speechThreshold,
    minSilenceDurationSamples = 0,
    minSpeechDurationSamples = 0,
    speechPadSamples = 0,
  } = options;

  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new SegmenterConfigError(
      `sampleRate must be a positive integer, got ${sampleRate}`,
      "sampleRate",
    );
  }

  if (!Number.isFinite(speechThreshold) || speechThreshold <= 0 || speechThreshold > 1) {
    throw new SegmenterConfigError(
      `speechThreshold must be in (0, 1], got ${speechThreshold}`,
      "speechThreshold",
    );
  }

  const silenceThreshold = options.silenceThreshold ?? deriveSilenceThreshold(speechThreshold);
  if (
    !Number.isFinite(silenceThreshold) ||
    silenceThreshold < 0 ||
    silenceThreshold >= speechThreshold
  ) {
    const origin = options.silenceThreshold === undefined ? " (derived)" : "";
    throw new SegmenterConfigError(
      `silenceThreshold${origin} must be in [0, ${speechThreshold}), got ${silenceThreshold}`,
      "silenceThreshold",
    );
  }

  requireNonNegativeInteger(minSilenceDurationSamples, "minSilenceDurationSamples");
  requireNonNegativeInteger(minSpeechDurationSamples, "minSpeechDurationSamples");
  requireNonNegativeInteger(speechPadSamples, "speechPadSamples");

  return Object.freeze({
    sampleRate,
    speechThreshold,
    silenceThreshold,
    minSilenceDurationSamples,
    minSpeechDurationSamples,
    speechPadSamples,
  });
}

// ─── configFromTiming ───────────────────────────────────────────────────────────

/**
 * Convert millisecond options into an engine configuration plus frame size.
 */
export function configFromTiming(options: SegmenterTimingOptions): ResolvedTiming {
  requireNonNegativeFinite(options.minSilenceDurationMs, "minSilenceDurationMs");
  requireNonNegativeFinite(options.minSpeechDurationMs, "minSpeechDurationMs");
  requireNonNegativeFinite(options.speechPadMs, "speechPadMs");

  if (!Number.isFinite(options.frameMs) || options.frameMs <= 0) {
    throw new SegmenterConfigError(`frameMs must be positive, got ${options.frameMs}`, "frameMs");
  }

  const { sampleRate } = options;
  const config = createSegmenterConfig({
    sampleRate,
    speechThreshold: options.threshold,
    silenceThreshold: options.negThreshold,
    minSilenceDurationSamples: msToSamples(options.minSilenceDurationMs, sampleRate),
    minSpeechDurationSamples: msToSamples(options.minSpeechDurationMs, sampleRate),
    speechPadSamples: msToSamples(options.speechPadMs, sampleRate),
  });

  const frameSize = frameSizeFor(sampleRate, options.frameMs);
  if (frameSize <= 0) {
    throw new SegmenterConfigError(
      `frameMs ${options.frameMs} is shorter than one sample at ${sampleRate}Hz`,
      "frameMs",
    );
  }

  return { config, frameSize };
}

/**
 * Reject sample rates the service does not handle. The engine itself accepts
 * any positive rate; this guard is for externally supplied configuration.
 */
export function assertSupportedSampleRate(sampleRate: number): void {
  if (!SUPPORTED_SAMPLE_RATES.includes(sampleRate)) {
    throw new SegmenterConfigError(
      `Unsupported sample rate ${sampleRate}. Expected one of: ${SUPPORTED_SAMPLE_RATES.join(", ")}`,
      "sampleRate",
    );
  }
}

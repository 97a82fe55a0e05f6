// Speech Segmentation Service - Environment configuration
// Every value can be overridden through the environment (or a .env file loaded
// by the entry point). Invalid values throw at start-up.

import {
  DEFAULT_TIMING_OPTIONS,
  assertSupportedSampleRate,
  configFromTiming,
  type SegmenterTimingOptions,
} from "./segmenter-config.js";

export const APP_NAME = "Speech Segmentation Service";
export const APP_VERSION = "0.1.0";

export interface AppConfig {
  port: number;
  timing: SegmenterTimingOptions;
  statusIntervalMs: number;
}

const DEFAULT_PORT = 3000;
const DEFAULT_STATUS_INTERVAL_MS = 100;

type Env = Record<string, string | undefined>;

/**
 * Read a numeric variable. Unset or empty means "use the fallback"; anything
 * that does not parse as a finite number is an error.
 */
function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readOptionalNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  return readNumber(env, name, 0);
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  const port = readNumber(env, "PORT", DEFAULT_PORT);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be an integer in [0, 65535], got ${port}`);
  }

  const timing: SegmenterTimingOptions = {
    sampleRate: readNumber(env, "SAMPLE_RATE", DEFAULT_TIMING_OPTIONS.sampleRate),
    threshold: readNumber(env, "VAD_THRESHOLD", DEFAULT_TIMING_OPTIONS.threshold),
    negThreshold: readOptionalNumber(env, "VAD_NEG_THRESHOLD"),
    minSilenceDurationMs: readNumber(env, "VAD_MIN_SILENCE_MS", DEFAULT_TIMING_OPTIONS.minSilenceDurationMs),
    minSpeechDurationMs: readNumber(env, "VAD_MIN_SPEECH_MS", DEFAULT_TIMING_OPTIONS.minSpeechDurationMs),
    speechPadMs: readNumber(env, "VAD_SPEECH_PAD_MS", DEFAULT_TIMING_OPTIONS.speechPadMs),
    frameMs: readNumber(env, "VAD_FRAME_MS", DEFAULT_TIMING_OPTIONS.frameMs),
  };
  assertSupportedSampleRate(timing.sampleRate);
  configFromTiming(timing);

  const statusIntervalMs = readNumber(env, "STATUS_INTERVAL_MS", DEFAULT_STATUS_INTERVAL_MS);
  if (statusIntervalMs < 0) {
    throw new Error(`STATUS_INTERVAL_MS must be non-negative, got ${statusIntervalMs}`);
  }

  return { port, timing, statusIntervalMs };
}

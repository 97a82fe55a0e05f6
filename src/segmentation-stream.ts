// ─── Segmentation Stream ────────────────────────────────────────────────────────
// Frame source adapter and event sink around one SpeechSegmenter. Converts PCM
// to float samples, fits frames to the scoring window, asks an injected scorer
// for a probability, drives the engine and turns its events into segments.
//
// All time-based decisions are made by the engine in samples. Wall-clock time
// is used only to rate-limit status callbacks and to measure processing time.

import { FrameContractError } from "./errors.js";
import type { SegmenterConfig } from "./segmenter-config.js";
import { SpeechSegmenter } from "./speech-segmenter.js";
import type { SegmentEvent, SpeechEndEvent, SpeechStartEvent } from "./speech-segmenter.js";
import type { SegmentationStatus, ServerLogger, SpeechSegment, StreamSummary } from "./types.js";
import { fitFrame, pcm16ToFloat32, samplesToSeconds } from "./utils.js";

/**
 * Opaque speech probability estimator. May keep state across frames (a
 * recurrent model does); `reset` is called when the stream starts over.
 */
export interface ProbabilityScorer {
  score(frame: Float32Array, sampleRate: number): number;
  reset?(): void;
}

export type SegmentationCallbacks = {
  onSpeechStart: (event: SpeechStartEvent) => void;
  onSpeechEnd: (event: SpeechEndEvent, segment: SpeechSegment) => void;
  /** The engine dropped an utterance whose speech run was too short. */
  onSegmentDiscarded: (startSample: number) => void;
  /** Called with the latest probability, throttled by `statusIntervalMs`. */
  onStatus: (status: SegmentationStatus) => void;
};

export interface SegmentationStreamOptions {
  config: SegmenterConfig;
  /** Samples per scoring window; audio frames are fitted to this length */
  frameSize: number;
  /** Minimum wall-clock interval between status callbacks. 0 = every frame */
  statusIntervalMs: number;
}

export interface SegmentationStreamDeps {
  callbacks?: Partial<SegmentationCallbacks>;
  scorer?: ProbabilityScorer;
  logger?: ServerLogger;
  /** Wall clock for status throttling. Defaults to Date.now */
  now?: () => number;
  /** High-resolution clock for processing time. Defaults to performance.now */
  clock?: () => number;
}

/** Frames per processing-time window */
export const PROCESSING_WINDOW_FRAMES = 100;

/** Average per-frame processing time above which a warning is logged */
export const SLOW_PROCESSING_MS = 5;

const silentLogger: ServerLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

interface OpenUtterance {
  startSample: number;
  frames: number;
}

export class SegmentationStream {
  readonly config: SegmenterConfig;
  readonly frameSize: number;

  private readonly segmenter: SpeechSegmenter;
  private readonly statusIntervalMs: number;
  private readonly callbacks: Partial<SegmentationCallbacks>;
  private readonly scorer: ProbabilityScorer | undefined;
  private readonly logger: ServerLogger;
  private readonly now: () => number;
  private readonly clock: () => number;

  private utterance: OpenUtterance | null = null;
  private segments: SpeechSegment[] = [];
  private framesProcessed = 0;
  private lastStatusEmitTime = 0;
  private processingTimes: number[] = [];

  constructor(options: SegmentationStreamOptions, deps: SegmentationStreamDeps = {}) {
    if (!Number.isInteger(options.frameSize) || options.frameSize <= 0) {
      throw new FrameContractError(`frameSize must be a positive integer, got ${options.frameSize}`);
    }

    this.config = options.config;
    this.frameSize = options.frameSize;
    this.statusIntervalMs = options.statusIntervalMs;
    this.segmenter = new SpeechSegmenter(options.config);
    this.callbacks = deps.callbacks ?? {};
    this.scorer = deps.scorer;
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? Date.now;
    this.clock = deps.clock ?? (() => performance.now());
  }

  get isSpeaking(): boolean {
    return this.segmenter.isSpeaking;
  }

  get samplesProcessed(): number {
    return this.segmenter.currentSample;
  }

  /**
   * Feed a probability computed elsewhere for a frame of `frameLengthSamples`.
   */
  feedProbability(probability: number, frameLengthSamples: number): SegmentEvent | null {
    const startedAt = this.clock();
    const event = this.ingest(probability, frameLengthSamples);
    this.recordProcessingTime(this.clock() - startedAt);
    return event;
  }

  /**
   * Score one block of float samples and feed the result. The block is
   * truncated or zero-padded to `frameSize` first, so the engine always
   * advances by exactly one frame.
   */
  feedAudio(samples: Float32Array): SegmentEvent | null {
    if (!this.scorer) {
      throw new Error("No probability scorer configured for this stream");
    }
    const startedAt = this.clock();
    const frame = fitFrame(samples, this.frameSize);
    const probability = this.scorer.score(frame, this.config.sampleRate);
    const event = this.ingest(probability, this.frameSize);
    this.recordProcessingTime(this.clock() - startedAt);
    return event;
  }

  /**
   * Feed one block of 16-bit little-endian PCM.
   */
  feedPcm16(chunk: Buffer): SegmentEvent | null {
    if (chunk.length % 2 !== 0) {
      throw new FrameContractError(
        `PCM chunk byte length (${chunk.length}) is not a multiple of 2`,
      );
    }
    return this.feedAudio(pcm16ToFloat32(chunk));
  }

  /**
   * Start a new logical stream: engine, scorer state, segments and counters
   * all go back to their initial values. Configuration and callbacks stay.
   */
  reset(): void {
    this.segmenter.reset();
    this.scorer?.reset?.();
    this.utterance = null;
    this.segments = [];
    this.framesProcessed = 0;
    this.lastStatusEmitTime = 0;
    this.processingTimes = [];
  }

  summary(): StreamSummary {
    return {
      segments: [...this.segments],
      samplesProcessed: this.segmenter.currentSample,
      framesProcessed: this.framesProcessed,
      secondsProcessed: samplesToSeconds(this.segmenter.currentSample, this.config.sampleRate),
      speaking: this.segmenter.isSpeaking,
    };
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private ingest(probability: number, frameLengthSamples: number): SegmentEvent | null {
    const event = this.segmenter.process(probability, frameLengthSamples);
    this.framesProcessed++;

    if (event?.type === "speech_start") {
      this.utterance = { startSample: event.offsetSamples, frames: 1 };
      this.callbacks.onSpeechStart?.(event);
    } else if (this.utterance !== null) {
      this.utterance.frames++;

      if (event?.type === "speech_end") {
        const segment = this.closeUtterance(this.utterance, event);
        this.segments.push(segment);
        this.utterance = null;
        this.callbacks.onSpeechEnd?.(event, segment);
      } else if (!this.segmenter.isSpeaking) {
        const { startSample } = this.utterance;
        this.utterance = null;
        this.callbacks.onSegmentDiscarded?.(startSample);
      }
    }

    this.maybeEmitStatus(probability);
    return event;
  }

  private closeUtterance(utterance: OpenUtterance, event: SpeechEndEvent): SpeechSegment {
    const { sampleRate } = this.config;
    return {
      startSample: utterance.startSample,
      endSample: event.offsetSamples,
      startSeconds: samplesToSeconds(utterance.startSample, sampleRate),
      endSeconds: samplesToSeconds(event.offsetSamples, sampleRate),
      durationSeconds: samplesToSeconds(event.offsetSamples - utterance.startSample, sampleRate),
      frames: utterance.frames,
    };
  }

  private maybeEmitStatus(probability: number): void {
    const onStatus = this.callbacks.onStatus;
    if (!onStatus) return;

    const now = this.now();
    if (now - this.lastStatusEmitTime >= this.statusIntervalMs) {
      this.lastStatusEmitTime = now;
      onStatus({ probability, speaking: this.segmenter.isSpeaking });
    }
  }

  private recordProcessingTime(elapsedMs: number): void {
    this.processingTimes.push(elapsedMs);
    if (this.processingTimes.length < PROCESSING_WINDOW_FRAMES) return;

    const total = this.processingTimes.reduce((sum, ms) => sum + ms, 0);
    const averageMs = total / this.processingTimes.length;
    this.processingTimes = [];

    if (averageMs > SLOW_PROCESSING_MS) {
      this.logger.warn(
        `Slow frame processing: average ${averageMs.toFixed(1)}ms over ${PROCESSING_WINDOW_FRAMES} frames`,
      );
    }
  }
}

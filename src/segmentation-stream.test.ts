// Unit tests for SegmentationStream
// Segment assembly, discards, status throttling, processing-time warnings and
// the audio path through an injected scorer.

import { describe, it, expect, vi } from "vitest";
import { SegmentationStream, PROCESSING_WINDOW_FRAMES } from "./segmentation-stream.js";
import type { ProbabilityScorer, SegmentationStreamDeps } from "./segmentation-stream.js";
import { createSegmenterConfig } from "./segmenter-config.js";
import type { SegmenterOptions } from "./segmenter-config.js";
import { FrameContractError } from "./errors.js";
import type { SegmentationStatus, SpeechSegment } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

const FRAME = 256;

/** Two speech frames followed by three silence frames */
const UTTERANCE = [0.9, 0.9, 0.1, 0.1, 0.1];

function makeStream(
  overrides: Partial<SegmenterOptions> = {},
  deps: SegmentationStreamDeps = {},
  statusIntervalMs = 0,
): SegmentationStream {
  const config = createSegmenterConfig({
    sampleRate: 8000,
    speechThreshold: 0.5,
    silenceThreshold: 0.35,
    minSilenceDurationSamples: 512,
    minSpeechDurationSamples: 0,
    speechPadSamples: 0,
    ...overrides,
  });
  return new SegmentationStream({ config, frameSize: FRAME, statusIntervalMs }, deps);
}

function makeLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Scorer that records the frames it sees and answers from a script */
function makeScorer(probabilities: number[]) {
  const seen: Float32Array[] = [];
  let index = 0;
  const scorer: ProbabilityScorer = {
    score: (frame) => {
      seen.push(frame);
      return probabilities[index++ % probabilities.length];
    },
    reset: vi.fn(),
  };
  return { scorer, seen };
}

// ─── Segments ───────────────────────────────────────────────────────────────────

describe("SegmentationStream segments", () => {
  it("reports a start and an end with a completed segment", () => {
    const starts: number[] = [];
    const ends: Array<{ offset: number; segment: SpeechSegment }> = [];
    const stream = makeStream({}, {
      callbacks: {
        onSpeechStart: (event) => starts.push(event.offsetSamples),
        onSpeechEnd: (event, segment) => ends.push({ offset: event.offsetSamples, segment }),
      },
    });

    const events = UTTERANCE.map((p) => stream.feedProbability(p, FRAME));

    expect(events.map((e) => e?.type ?? null)).toEqual([
      "speech_start",
      null,
      null,
      null,
      "speech_end",
    ]);
    expect(starts).toEqual([0]);
    expect(ends).toEqual([
      {
        offset: 512,
        segment: {
          startSample: 0,
          endSample: 512,
          startSeconds: 0,
          endSeconds: 0.064,
          durationSeconds: 0.064,
          frames: 5,
        },
      },
    ]);
  });

  it("summarizes processed audio and completed segments", () => {
    const stream = makeStream();
    for (const p of UTTERANCE) stream.feedProbability(p, FRAME);

    const summary = stream.summary();
    expect(summary.samplesProcessed).toBe(1280);
    expect(summary.framesProcessed).toBe(5);
    expect(summary.secondsProcessed).toBe(0.16);
    expect(summary.speaking).toBe(false);
    expect(summary.segments).toHaveLength(1);
    expect(summary.segments[0].endSample).toBe(512);
  });

  it("reports an open utterance as speaking, not as a segment", () => {
    const stream = makeStream();
    stream.feedProbability(0.9, FRAME);
    stream.feedProbability(0.9, FRAME);

    expect(stream.isSpeaking).toBe(true);
    expect(stream.summary()).toMatchObject({ segments: [], speaking: true, samplesProcessed: 512 });
  });

  it("reports a discarded utterance when the speech run is too short", () => {
    const onSegmentDiscarded = vi.fn();
    const onSpeechEnd = vi.fn();
    const stream = makeStream(
      { minSpeechDurationSamples: 1000 },
      { callbacks: { onSegmentDiscarded, onSpeechEnd } },
    );

    const events = UTTERANCE.map((p) => stream.feedProbability(p, FRAME));

    expect(events.filter((e) => e !== null)).toEqual([{ type: "speech_start", offsetSamples: 0 }]);
    expect(onSegmentDiscarded).toHaveBeenCalledTimes(1);
    expect(onSegmentDiscarded).toHaveBeenCalledWith(0);
    expect(onSpeechEnd).not.toHaveBeenCalled();
    expect(stream.isSpeaking).toBe(false);
    expect(stream.summary().segments).toEqual([]);
  });

  it("returns a copy of the segment list", () => {
    const stream = makeStream();
    for (const p of UTTERANCE) stream.feedProbability(p, FRAME);

    stream.summary().segments.pop();
    expect(stream.summary().segments).toHaveLength(1);
  });

  it("propagates contract errors without advancing", () => {
    const stream = makeStream();
    expect(() => stream.feedProbability(1.5, FRAME)).toThrow(FrameContractError);
    expect(() => stream.feedProbability(0.5, 0)).toThrow(FrameContractError);
    expect(stream.samplesProcessed).toBe(0);
    expect(stream.summary().framesProcessed).toBe(0);
  });

  it("rejects a frame size that is not a positive integer", () => {
    const config = createSegmenterConfig({ sampleRate: 8000, speechThreshold: 0.5 });
    expect(() => new SegmentationStream({ config, frameSize: 0, statusIntervalMs: 0 })).toThrow(
      "frameSize must be a positive integer, got 0",
    );
  });
});

// ─── Status ─────────────────────────────────────────────────────────────────────

describe("SegmentationStream status", () => {
  it("emits status on every frame with a zero interval", () => {
    const statuses: SegmentationStatus[] = [];
    const stream = makeStream({}, { callbacks: { onStatus: (s) => statuses.push(s) } });

    stream.feedProbability(0.9, FRAME);
    stream.feedProbability(0.2, FRAME);

    expect(statuses).toEqual([
      { probability: 0.9, speaking: true },
      { probability: 0.2, speaking: true },
    ]);
  });

  it("throttles status by wall-clock interval", () => {
    let now = 1000;
    const onStatus = vi.fn();
    const stream = makeStream({}, { callbacks: { onStatus }, now: () => now }, 100);

    stream.feedProbability(0.1, FRAME); // 1000: emitted
    now = 1050;
    stream.feedProbability(0.2, FRAME); // 1050: throttled
    now = 1100;
    stream.feedProbability(0.3, FRAME); // 1100: emitted

    expect(onStatus).toHaveBeenCalledTimes(2);
    expect(onStatus).toHaveBeenNthCalledWith(1, { probability: 0.1, speaking: false });
    expect(onStatus).toHaveBeenNthCalledWith(2, { probability: 0.3, speaking: false });
  });
});

// ─── Processing time ────────────────────────────────────────────────────────────

describe("SegmentationStream processing time", () => {
  function steppingClock(stepMs: number): () => number {
    let t = 0;
    return () => {
      t += stepMs;
      return t;
    };
  }

  it("warns when the average over a full window is slow", () => {
    const logger = makeLogger();
    const stream = makeStream({}, { logger, clock: steppingClock(10) });

    for (let i = 0; i < PROCESSING_WINDOW_FRAMES - 1; i++) stream.feedProbability(0.1, FRAME);
    expect(logger.warn).not.toHaveBeenCalled();

    stream.feedProbability(0.1, FRAME);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith("Slow frame processing: average 10.0ms over 100 frames");
  });

  it("checks each window once", () => {
    const logger = makeLogger();
    const stream = makeStream({}, { logger, clock: steppingClock(10) });

    for (let i = 0; i < PROCESSING_WINDOW_FRAMES * 2 - 1; i++) stream.feedProbability(0.1, FRAME);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("stays quiet when processing is fast", () => {
    const logger = makeLogger();
    const stream = makeStream({}, { logger, clock: steppingClock(1) });

    for (let i = 0; i < PROCESSING_WINDOW_FRAMES * 3; i++) stream.feedProbability(0.1, FRAME);
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

// ─── Audio path ─────────────────────────────────────────────────────────────────

describe("SegmentationStream audio", () => {
  it("refuses audio without a scorer", () => {
    const stream = makeStream();
    expect(() => stream.feedAudio(new Float32Array(FRAME))).toThrow(
      "No probability scorer configured for this stream",
    );
  });

  it("fits every block to the frame size before scoring", () => {
    const { scorer, seen } = makeScorer([0.1]);
    const stream = makeStream({}, { scorer });

    stream.feedAudio(new Float32Array(100));
    stream.feedAudio(new Float32Array(FRAME));
    stream.feedAudio(new Float32Array(1000));

    expect(seen.map((f) => f.length)).toEqual([FRAME, FRAME, FRAME]);
    expect(stream.samplesProcessed).toBe(3 * FRAME);
  });

  it("drives the engine with scored probabilities", () => {
    const { scorer } = makeScorer(UTTERANCE);
    const stream = makeStream({}, { scorer });

    const events = UTTERANCE.map(() => stream.feedAudio(new Float32Array(FRAME)));

    expect(events.filter((e) => e !== null)).toEqual([
      { type: "speech_start", offsetSamples: 0 },
      { type: "speech_end", offsetSamples: 512 },
    ]);
  });

  it("converts PCM16 before scoring", () => {
    const { scorer, seen } = makeScorer([0.1]);
    const stream = makeStream({}, { scorer });
    const pcm = Buffer.alloc(FRAME * 2);
    pcm.writeInt16LE(16384, 0);
    pcm.writeInt16LE(-32768, 2);

    stream.feedPcm16(pcm);

    expect(seen).toHaveLength(1);
    expect(seen[0][0]).toBe(0.5);
    expect(seen[0][1]).toBe(-1);
    expect(seen[0][2]).toBe(0);
  });

  it("rejects PCM with an odd byte length", () => {
    const { scorer } = makeScorer([0.1]);
    const stream = makeStream({}, { scorer });
    expect(() => stream.feedPcm16(Buffer.alloc(3))).toThrow(
      "PCM chunk byte length (3) is not a multiple of 2",
    );
  });
});

// ─── Reset ──────────────────────────────────────────────────────────────────────

describe("SegmentationStream reset", () => {
  it("restores initial state and resets the scorer", () => {
    const { scorer } = makeScorer([0.9]);
    const stream = makeStream({}, { scorer });
    for (const p of UTTERANCE) stream.feedProbability(p, FRAME);
    stream.feedAudio(new Float32Array(FRAME));

    stream.reset();

    expect(scorer.reset).toHaveBeenCalledTimes(1);
    expect(stream.summary()).toEqual({
      segments: [],
      samplesProcessed: 0,
      framesProcessed: 0,
      secondsProcessed: 0,
      speaking: false,
    });
  });

  it("restarts offsets from zero", () => {
    const stream = makeStream();
    for (const p of UTTERANCE) stream.feedProbability(p, FRAME);
    stream.reset();

    expect(stream.feedProbability(0.9, FRAME)).toEqual({ type: "speech_start", offsetSamples: 0 });
  });
});

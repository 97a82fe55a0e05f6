import { describe, it, expect } from "vitest";
import { fitFrame, msToSamples, pcm16ToFloat32, samplesToSeconds } from "./utils.js";

describe("msToSamples", () => {
  it("converts whole milliseconds at telephony rates", () => {
    expect(msToSamples(1000, 8000)).toBe(8000);
    expect(msToSamples(32, 8000)).toBe(256);
    expect(msToSamples(100, 16000)).toBe(1600);
    expect(msToSamples(0, 16000)).toBe(0);
  });

  it("rounds to the nearest sample", () => {
    // 44100 * 0.01 = 441, 22050 * 0.001 = 22.05
    expect(msToSamples(10, 44100)).toBe(441);
    expect(msToSamples(1, 22050)).toBe(22);
    expect(msToSamples(0.07, 8000)).toBe(1);
  });
});

describe("samplesToSeconds", () => {
  it("converts offsets to seconds", () => {
    expect(samplesToSeconds(512, 8000)).toBe(0.064);
    expect(samplesToSeconds(8000, 8000)).toBe(1);
    expect(samplesToSeconds(0, 16000)).toBe(0);
  });

  it("rounds to the millisecond", () => {
    // 100 / 16000 = 0.00625
    expect(samplesToSeconds(100, 16000)).toBe(0.006);
    // 2560 / 8000 = 0.32
    expect(samplesToSeconds(2560, 8000)).toBe(0.32);
  });
});

describe("pcm16ToFloat32", () => {
  it("normalizes by 32768", () => {
    const buf = Buffer.alloc(8);
    buf.writeInt16LE(0, 0);
    buf.writeInt16LE(16384, 2);
    buf.writeInt16LE(-32768, 4);
    buf.writeInt16LE(-8192, 6);

    expect(Array.from(pcm16ToFloat32(buf))).toEqual([0, 0.5, -1, -0.25]);
  });

  it("ignores a trailing odd byte", () => {
    const buf = Buffer.from([0x00, 0x40, 0x7f]);
    expect(Array.from(pcm16ToFloat32(buf))).toEqual([0.5]);
  });

  it("returns an empty array for an empty buffer", () => {
    expect(pcm16ToFloat32(Buffer.alloc(0))).toHaveLength(0);
  });
});

describe("fitFrame", () => {
  it("returns the same array when the length already matches", () => {
    const samples = new Float32Array([0.1, 0.2, 0.3]);
    expect(fitFrame(samples, 3)).toBe(samples);
  });

  it("truncates longer blocks", () => {
    const samples = new Float32Array([0.5, 0.25, -0.5, -0.25]);
    expect(Array.from(fitFrame(samples, 2))).toEqual([0.5, 0.25]);
  });

  it("zero-pads shorter blocks at the end", () => {
    const samples = new Float32Array([0.5, -0.5]);
    expect(Array.from(fitFrame(samples, 4))).toEqual([0.5, -0.5, 0, 0]);
  });
});

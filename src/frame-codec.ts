/**
 * Binary frame codec for SG-prefixed wire format.
 *
 * Wire format: [0x53 0x47 magic ("SG")][type byte][3-byte big-endian uint24 header JSON length][UTF-8 header JSON][payload bytes]
 *
 * Probability frames: type byte 0x50, header { seq, probability, samples }, no payload
 * Audio frames: type byte 0x41, header { seq }, payload = 16-bit LE PCM bytes
 */

import type { AudioFrameHeader, FrameType, ProbabilityFrameHeader } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const SG_MAGIC_0 = 0x53; // 'S'
const SG_MAGIC_1 = 0x47; // 'G'
const TYPE_PROBABILITY = 0x50; // 'P'
const TYPE_AUDIO = 0x41; // 'A'

/** Minimum valid frame size: 2 (magic) + 1 (type) + 3 (header len) = 6 bytes */
const MIN_FRAME_SIZE = 6;

/** Maximum header JSON size in bytes */
const MAX_HEADER_JSON_BYTES = 4096;

/** Maximum PCM payload per audio frame (1 s of 16 kHz mono) */
const MAX_AUDIO_PAYLOAD_BYTES = 32000;

// ─── Encode ─────────────────────────────────────────────────────────────────────

function encodeFrame(typeByte: number, header: object, payload: Buffer | null): Buffer {
  const headerJson = Buffer.from(JSON.stringify(header), "utf-8");
  const payloadLength = payload ? payload.length : 0;
  const buf = Buffer.alloc(MIN_FRAME_SIZE + headerJson.length + payloadLength);

  let offset = 0;
  buf[offset++] = SG_MAGIC_0;
  buf[offset++] = SG_MAGIC_1;
  buf[offset++] = typeByte;

  // Write uint24 big-endian header length
  buf[offset++] = (headerJson.length >> 16) & 0xff;
  buf[offset++] = (headerJson.length >> 8) & 0xff;
  buf[offset++] = headerJson.length & 0xff;

  headerJson.copy(buf, offset);
  offset += headerJson.length;

  if (payload) {
    payload.copy(buf, offset);
  }

  return buf;
}

/**
 * Encode a probability frame.
 * Produces: [0x53 0x47][0x50][uint24 header len][header JSON]
 */
export function encodeProbabilityFrame(header: ProbabilityFrameHeader): Buffer {
  return encodeFrame(TYPE_PROBABILITY, header, null);
}

/**
 * Encode an audio frame.
 * Produces: [0x53 0x47][0x41][uint24 header len][header JSON][PCM bytes]
 */
export function encodeAudioFrame(header: AudioFrameHeader, pcmBuffer: Buffer): Buffer {
  return encodeFrame(TYPE_AUDIO, header, pcmBuffer);
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Validate a ProbabilityFrameHeader. Range checks on the probability itself
 * are left to the engine, which rejects out-of-range values loudly.
 */
function isValidProbabilityFrameHeader(obj: unknown): obj is ProbabilityFrameHeader {
  if (typeof obj !== "object" || obj === null) return false;
  if (!("seq" in obj) || !isNonNegativeInteger(obj.seq)) return false;
  if (!("probability" in obj) || typeof obj.probability !== "number") return false;
  if (!("samples" in obj) || !isNonNegativeInteger(obj.samples) || obj.samples === 0) return false;
  return true;
}

function isValidAudioFrameHeader(obj: unknown): obj is AudioFrameHeader {
  if (typeof obj !== "object" || obj === null) return false;
  return "seq" in obj && isNonNegativeInteger(obj.seq);
}

/**
 * Check magic, type byte and header length, then parse the header JSON.
 * Returns the parsed header and the offset where the payload starts, or null.
 */
function readHeader(data: Buffer, typeByte: number): { header: unknown; payloadOffset: number } | null {
  // Check minimum size
  if (!Buffer.isBuffer(data) || data.length < MIN_FRAME_SIZE) return null;

  // Check SG magic prefix and type byte
  if (data[0] !== SG_MAGIC_0 || data[1] !== SG_MAGIC_1) return null;
  if (data[2] !== typeByte) return null;

  // Read uint24 big-endian header length
  const headerLen = (data[3] << 16) | (data[4] << 8) | data[5];
  if (headerLen <= 0 || headerLen > MAX_HEADER_JSON_BYTES) return null;
  if (data.length < MIN_FRAME_SIZE + headerLen) return null;

  let header: unknown;
  try {
    header = JSON.parse(data.toString("utf-8", MIN_FRAME_SIZE, MIN_FRAME_SIZE + headerLen));
  } catch {
    return null;
  }

  return { header, payloadOffset: MIN_FRAME_SIZE + headerLen };
}

/**
 * Decode a probability frame. Returns null on malformed input, including
 * trailing bytes after the header.
 */
export function decodeProbabilityFrame(data: Buffer): ProbabilityFrameHeader | null {
  const parsed = readHeader(data, TYPE_PROBABILITY);
  if (!parsed) return null;
  if (parsed.payloadOffset !== data.length) return null;
  if (!isValidProbabilityFrameHeader(parsed.header)) return null;
  return parsed.header;
}

/**
 * Decode an audio frame. Returns null on malformed input, an empty or
 * oversized payload, or a payload that is not 16-bit aligned.
 */
export function decodeAudioFrame(data: Buffer): { header: AudioFrameHeader; pcmBuffer: Buffer } | null {
  const parsed = readHeader(data, TYPE_AUDIO);
  if (!parsed) return null;
  if (!isValidAudioFrameHeader(parsed.header)) return null;

  const pcmBuffer = data.subarray(parsed.payloadOffset);
  if (pcmBuffer.length === 0 || pcmBuffer.length > MAX_AUDIO_PAYLOAD_BYTES) return null;
  if (pcmBuffer.length % 2 !== 0) return null;

  return { header: parsed.header, pcmBuffer };
}

// ─── Inspection ─────────────────────────────────────────────────────────────────

/**
 * Get the frame type from an SG-prefixed buffer.
 * Returns 'probability', 'audio', or null if not a valid SG frame.
 */
export function getFrameType(data: Buffer): FrameType | null {
  if (!Buffer.isBuffer(data) || data.length < 3) return null;
  if (data[0] !== SG_MAGIC_0 || data[1] !== SG_MAGIC_1) return null;

  if (data[2] === TYPE_PROBABILITY) return "probability";
  if (data[2] === TYPE_AUDIO) return "audio";

  return null;
}

// Shared sample/time helpers for the Speech Segmentation Service.
//
// The engine only ever speaks in raw sample counts. Everything that converts
// between samples, milliseconds, seconds and PCM encodings lives here so the
// session and server layers agree on the arithmetic.

/** Full-scale magnitude of a signed 16-bit sample */
const PCM16_FULL_SCALE = 32768;

/**
 * Convert a duration in milliseconds to a sample count at the given rate.
 * Rounds to the nearest sample; common rates (8k, 16k) divide evenly anyway.
 */
export function msToSamples(ms: number, sampleRate: number): number {
  return Math.round((sampleRate * ms) / 1000);
}

/**
 * Convert a sample offset to seconds, rounded to the millisecond.
 */
export function samplesToSeconds(samples: number, sampleRate: number): number {
  return Math.round((samples / sampleRate) * 1000) / 1000;
}

/**
 * Decode 16-bit little-endian PCM into float samples in [-1, 1).
 * A trailing odd byte is ignored; callers that care reject it first.
 */
export function pcm16ToFloat32(chunk: Buffer): Float32Array {
  const sampleCount = Math.floor(chunk.length / 2);
  const out = new Float32Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    out[i] = chunk.readInt16LE(i * 2) / PCM16_FULL_SCALE;
  }
  return out;
}

/**
 * Force a block of samples to exactly `frameSize` samples.
 *
 * Longer blocks are truncated, shorter ones zero-padded at the end. Scorers
 * expect a fixed window, and capture devices do not always deliver one.
 * Returns the input unchanged when it already has the right length.
 */
export function fitFrame(samples: Float32Array, frameSize: number): Float32Array {
  if (samples.length === frameSize) return samples;
  if (samples.length > frameSize) return samples.subarray(0, frameSize);
  const padded = new Float32Array(frameSize);
  padded.set(samples);
  return padded;
}

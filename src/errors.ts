// Speech Segmentation Service - Engine error types
//
// Configuration errors surface at construction and are fatal to that engine.
// Frame contract errors mean the caller (usually a broken scorer) handed the
// engine a value it must never see; they are thrown, never coerced.

export class SegmenterConfigError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = "SegmenterConfigError";
  }
}

export class FrameContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameContractError";
  }
}

// Speech Segmentation Service - Client message schemas
// Every JSON WebSocket message is `{ type, ...payload }`. Shapes are checked
// here; whether a timing combination makes sense is decided by
// segmenter-config when the options are applied.

import { z } from "zod";

export const TimingOverridesSchema = z
  .object({
    sampleRate: z.number().int().positive(),
    threshold: z.number(),
    negThreshold: z.number(),
    minSilenceDurationMs: z.number().nonnegative(),
    minSpeechDurationMs: z.number().nonnegative(),
    speechPadMs: z.number().nonnegative(),
    frameMs: z.number().positive(),
  })
  .partial()
  .strict();

export const ConfigureMessageSchema = z.object({
  type: z.literal("configure"),
  options: TimingOverridesSchema,
});

export const StartStreamMessageSchema = z.object({
  type: z.literal("start_stream"),
});

export const FrameMessageSchema = z.object({
  type: z.literal("frame"),
  probability: z.number(),
  /** Frame length in samples */
  samples: z.number().int().positive(),
});

export const ResetMessageSchema = z.object({
  type: z.literal("reset"),
});

export const StopStreamMessageSchema = z.object({
  type: z.literal("stop_stream"),
});

export const ClientMessageSchema = z.discriminatedUnion("type", [
  ConfigureMessageSchema,
  StartStreamMessageSchema,
  FrameMessageSchema,
  ResetMessageSchema,
  StopStreamMessageSchema,
]);
export type ClientMessage = z.infer<typeof ClientMessageSchema>;

/**
 * Parse a text WebSocket message. Throws an Error describing the first
 * problem when the text is not JSON or not a known message.
 */
export function parseClientMessage(text: string): ClientMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new Error("Message is not valid JSON");
  }

  const result = ClientMessageSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw new Error(`Invalid client message${where}: ${issue ? issue.message : "unknown error"}`);
  }
  return result.data;
}

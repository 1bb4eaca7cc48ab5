import type { EngineOutput, OutputMode, SegmentArtifact } from "../types";

export type InvocationOptions = {
  model: string
  language: string
  outputMode: OutputMode
}

/// Hands one segment to a speech-to-text engine. Rejects with `InvocationError`.
export interface TranscriptionInvoker {
  invoke(artifact: SegmentArtifact): Promise<EngineOutput>;
}

export const MODELS = [
  "tiny.en",
  "tiny",
  "base.en",
  "base",
  "small.en",
  "small",
  "medium.en",
  "medium",
  "large-v1",
  "large-v2",
  "large-v3",
  "large-v3-turbo",
] as const;

export type ModelName = typeof MODELS[number];

const knownModels: readonly string[] = MODELS;

export const isModelName = (model: string): model is ModelName =>
  knownModels.includes(model);

export type OutputMode = 'structured' | 'plain';

export type SessionState =
  | 'STARTING'
  | 'BUFFERING'
  | 'RUNNING'
  | 'STOPPING'
  | 'TERMINATED'
  | 'ABORTED';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/// A half-open interval `[start, start + duration)` in seconds from capture start.
export type SegmentWindow = {
  readonly index: number
  readonly start: number
  readonly duration: number
}

export type SegmentArtifact = {
  readonly window: SegmentWindow
  readonly path: string
  readonly sampleRate: number
  readonly channels: number
}

export type RecordStatus = 'ok' | 'parse_error' | 'invocation_error';

export type TranscriptionRecord = {
  readonly index: number
  readonly start: number
  readonly duration: number
  readonly status: RecordStatus
  readonly text: string
  /// The engine's own JSON object, in structured mode.
  readonly structured?: JsonObject
  /// Raw engine output kept for diagnostics when it could not be parsed.
  readonly raw?: string
  readonly error?: string
}

/// Raw output of one engine run, both channels plus exit status.
export type EngineOutput = {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

export interface StreamConfig {
  readonly streamUrl: string
  readonly stepSeconds: number
  /// 0 means unbounded.
  readonly maxDurationSeconds: number
  readonly model: string
  readonly language: string
  readonly outputMode: OutputMode
  readonly verbosity: number
  readonly whisperRoot: string
  readonly threads: number
  /// Soft deadline per engine run; 0 disables it.
  readonly transcribeTimeoutSeconds: number
  readonly extractRetries: number
  readonly extractBackoffMs: number
  readonly ffmpegPath: string
  readonly scratchRoot: string
  readonly port: number | null
}

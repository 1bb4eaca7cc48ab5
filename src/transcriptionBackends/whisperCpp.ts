import path from "node:path";

import { InvocationError } from "../errors";
import { runProcess, type ProcessResult, type Spawner } from "../process";
import type { EngineOutput, SegmentArtifact } from "../types";
import type { InvocationOptions, TranscriptionInvoker } from ".";

export type WhisperCppOptions = InvocationOptions & {
  /// Root of a whisper.cpp checkout with a built `build/bin/whisper-cli`.
  root: string
  threads: number
  /// 0: wait as long as the engine takes.
  timeoutSeconds: number
  spawner?: Spawner
}

export const whisperCliPath = (root: string): string =>
  path.join(root, "build", "bin", "whisper-cli");

export const modelPath = (root: string, model: string): string =>
  path.join(root, "models", `ggml-${model}.bin`);

export const whisperArgs = (options: WhisperCppOptions, audioPath: string): string[] => [
  "-t", String(options.threads),
  "-m", modelPath(options.root, options.model),
  "-f", audioPath,
  "--language", options.language,
  ...(options.outputMode === "structured" ? ["-poai"] : ["--no-timestamps", "-otxt"]),
];

/**
 * Runs whisper-cli on one segment and waits for it to finish. This is the
 * slow call of the pipeline; the optional deadline turns a hung engine into
 * an `InvocationError` for the segment.
 */
export class WhisperCppInvoker implements TranscriptionInvoker {
  constructor(private readonly options: WhisperCppOptions) {}

  async invoke(artifact: SegmentArtifact): Promise<EngineOutput> {
    const binary = whisperCliPath(this.options.root);
    const { window } = artifact;

    let result: ProcessResult;
    try {
      result = await runProcess(binary, whisperArgs(this.options, artifact.path), {
        spawner: this.options.spawner,
        timeoutMs: this.options.timeoutSeconds * 1000,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new InvocationError(window, "unreachable", `${binary}: ${message}`, "", { cause: err });
    }

    if (result.timedOut) {
      throw new InvocationError(
        window,
        "timeout",
        `no result after ${this.options.timeoutSeconds}s`,
        result.stderr,
      );
    }
    const { exitCode } = result;
    if (exitCode !== 0) {
      const status = exitCode ?? result.signal;
      throw new InvocationError(window, "exit-status", `whisper-cli exited with ${status}`, result.stderr);
    }

    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode,
    };
  }
}

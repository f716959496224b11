import fsPromises from "node:fs/promises";
import { PerFileTranscodeError, ShutdownRequestedError, formatError } from "../errors.js";
import { delay } from "../utils/delay.js";
import {
  ManagedProcess,
  describeExit,
  type PipelineProcess,
  type ProcessExit,
  type ProcessLauncher
} from "./process.js";

export type FeederRole = "video-loop" | "audio-loop";

export type FeederOptions = {
  role: FeederRole;
  generation: number;
  entries: readonly string[];
  command: string;
  buildArgs: (filePath: string) => string[];
  launcher: ProcessLauncher;
  idleDelayMs: number;
  fileExists?: (filePath: string) => Promise<boolean>;
};

export const isPlayableFile = async (filePath: string) => {
  try {
    return (await fsPromises.stat(filePath)).isFile();
  } catch {
    return false;
  }
};

/**
 * Loops its plan forever, one ffmpeg per file. A file that fails is logged and skipped;
 * only stop() ends the loop.
 */
export class FeederLoop implements PipelineProcess {
  readonly role: FeederRole;
  readonly exited: Promise<ProcessExit>;
  private readonly options: FeederOptions;
  private readonly label: string;
  private readonly controller = new AbortController();
  private current: ManagedProcess | null = null;
  private stopping = false;
  private running = true;
  private passes = 0;

  constructor(options: FeederOptions) {
    this.options = options;
    this.role = options.role;
    this.label = `Feeder ${options.role}#${options.generation}`;
    this.exited = this.run().then(
      () => ({ code: 0, signal: null, error: null }),
      (error: unknown) => {
        console.error(`${this.label}: loop failed: ${formatError(error)}`);
        return { code: null, signal: null, error: error instanceof Error ? error : new Error(String(error)) };
      }
    );
  }

  get pid() {
    return this.current?.pid;
  }

  get completedPasses() {
    return this.passes;
  }

  isAlive() {
    return this.running;
  }

  private async run() {
    try {
      while (!this.stopping) {
        const played = await this.playPass();
        if (this.stopping) break;
        this.passes += 1;
        if (played === 0) {
          console.warn(
            `${this.label}: nothing playable in this pass; waiting ${this.options.idleDelayMs}ms`
          );
          try {
            await delay(this.options.idleDelayMs, this.controller.signal);
          } catch (error) {
            if (error instanceof ShutdownRequestedError) break;
            throw error;
          }
        }
      }
    } finally {
      this.running = false;
    }
  }

  private async playPass() {
    const fileExists = this.options.fileExists ?? isPlayableFile;
    let played = 0;
    for (const filePath of this.options.entries) {
      if (this.stopping) break;
      if (!(await fileExists(filePath))) {
        continue;
      }
      if (await this.playOne(filePath)) {
        played += 1;
      }
    }
    return played;
  }

  private async playOne(filePath: string) {
    if (this.stopping) return false;
    let child: ManagedProcess;
    try {
      child = new ManagedProcess(
        this.role,
        this.options.launcher(this.options.command, this.options.buildArgs(filePath)),
        this.label
      );
    } catch (error) {
      this.reportFailure(new PerFileTranscodeError(filePath, formatError(error)));
      return false;
    }
    this.current = child;
    const exit = await child.exited;
    this.current = null;
    if (this.stopping) return false;
    if (exit.error || exit.code !== 0) {
      this.reportFailure(new PerFileTranscodeError(filePath, describeExit(exit)));
      return false;
    }
    return true;
  }

  private reportFailure(failure: PerFileTranscodeError) {
    console.warn(`${this.label}: ${failure.message}; skipping`);
  }

  async stop(graceMs: number) {
    this.stopping = true;
    this.controller.abort();
    const current = this.current;
    if (current) {
      await current.stop(graceMs);
    }
    return this.exited;
  }
}

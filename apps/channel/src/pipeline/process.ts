import { spawn } from "node:child_process";
import type { Readable } from "node:stream";

export type ProcessRole = "video-loop" | "audio-loop" | "muxer" | "single-pipeline";

export type ProcessExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
  error: Error | null;
};

/** The slice of ChildProcess the supervisor relies on. */
export type ChildHandle = {
  readonly pid?: number | undefined;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
};

export type ProcessLauncher = (command: string, args: string[]) => ChildHandle;

export const spawnProcess: ProcessLauncher = (command, args) =>
  spawn(command, args, { stdio: ["ignore", "ignore", "pipe"] });

export type PipelineProcess = {
  readonly role: ProcessRole;
  readonly pid: number | undefined;
  readonly exited: Promise<ProcessExit>;
  isAlive(): boolean;
  /** SIGTERM, then SIGKILL once `graceMs` passes; resolves after the process is reaped. */
  stop(graceMs: number): Promise<ProcessExit>;
};

export const describeExit = (exit: ProcessExit) =>
  exit.error
    ? exit.error.message
    : `exited with code ${exit.code ?? "unknown"} (${exit.signal ?? "no signal"})`;

const forwardLines = (stream: Readable, label: string) => {
  let buffered = "";
  stream.on("data", (chunk: Buffer) => {
    const parts = (buffered + chunk.toString()).split(/\r\n|\n|\r/);
    buffered = parts.pop() ?? "";
    for (const line of parts) {
      if (line.trim()) {
        console.log(`${label}: ${line}`);
      }
    }
  });
};

export class ManagedProcess implements PipelineProcess {
  readonly role: ProcessRole;
  readonly exited: Promise<ProcessExit>;
  private readonly child: ChildHandle;
  private alive = true;

  constructor(role: ProcessRole, child: ChildHandle, label: string) {
    this.role = role;
    this.child = child;
    this.exited = new Promise<ProcessExit>((resolve) => {
      const finish = (exit: ProcessExit) => {
        if (!this.alive) return;
        this.alive = false;
        resolve(exit);
      };
      child.once("exit", (code, signal) => {
        finish({ code, signal, error: null });
      });
      child.on("error", (error) => {
        // Without a pid the process never started; otherwise a failed kill, the exit follows.
        if (child.pid === undefined) {
          finish({ code: null, signal: null, error });
        } else {
          console.error(`${label}: ${error.message}`);
        }
      });
    });
    if (child.stderr) {
      forwardLines(child.stderr, label);
    }
  }

  get pid() {
    return this.child.pid;
  }

  isAlive() {
    return this.alive;
  }

  private waitForExit(ms: number) {
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), ms);
      void this.exited.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  async stop(graceMs: number) {
    if (!this.alive) {
      return this.exited;
    }
    if (graceMs > 0) {
      this.child.kill("SIGTERM");
      if (await this.waitForExit(graceMs)) {
        return this.exited;
      }
    }
    if (this.alive) {
      this.child.kill("SIGKILL");
    }
    return this.exited;
  }
}

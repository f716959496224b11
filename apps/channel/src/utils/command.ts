import { spawn } from "node:child_process";

export type CommandRunner = (command: string, args: string[], signal?: AbortSignal) => Promise<string>;

export const isCommandMissing = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/** Runs a command to completion and resolves with its stdout; non-zero exits reject with stderr. */
export const runCommand: CommandRunner = (command, args, signal) =>
  new Promise<string>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], signal });
    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.on("error", (error) => {
      reject(error);
    });
    child.on("close", (code) => {
      if (code === 0) {
        resolve(stdout);
      } else {
        reject(new Error(stderr.trim() || `${command} exited with code ${code ?? "unknown"}`));
      }
    });
  });

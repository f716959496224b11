import type { MediaKind } from "./library/media.js";

export const formatError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// Fatal to one start attempt; the watcher retries on its next tick.
export class EmptyLibraryError extends Error {
  readonly kind: MediaKind;
  readonly dir: string;

  constructor(kind: MediaKind, dir: string) {
    super(`No ${kind} files found in ${dir}`);
    this.name = "EmptyLibraryError";
    this.kind = kind;
    this.dir = dir;
  }
}

export type ResolutionAttempt = {
  format: string;
  reason: string;
};

export class ResolutionFailedError extends Error {
  readonly sourceUrl: string;
  readonly attempts: ResolutionAttempt[];

  constructor(sourceUrl: string, attempts: ResolutionAttempt[]) {
    const tried = attempts.map((attempt) => `${attempt.format} (${attempt.reason})`).join(", ");
    super(`Could not resolve audio for ${sourceUrl}; tried ${tried || "no formats"}`);
    this.name = "ResolutionFailedError";
    this.sourceUrl = sourceUrl;
    this.attempts = attempts;
  }
}

export class SubprocessCrashedError extends Error {
  readonly role: string;
  readonly generation: number;
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(role: string, generation: number, code: number | null, signal: NodeJS.Signals | null) {
    super(
      `${role} of generation ${generation} exited with code ${code ?? "unknown"} (${signal ?? "no signal"})`
    );
    this.name = "SubprocessCrashedError";
    this.role = role;
    this.generation = generation;
    this.code = code;
    this.signal = signal;
  }
}

export class ShutdownRequestedError extends Error {
  constructor(reason = "shutdown requested") {
    super(reason);
    this.name = "ShutdownRequestedError";
  }
}

// Never leaves the feeder that hit it.
export class PerFileTranscodeError extends Error {
  readonly filePath: string;

  constructor(filePath: string, detail: string) {
    super(`Failed to transcode ${filePath}: ${detail}`);
    this.name = "PerFileTranscodeError";
    this.filePath = filePath;
  }
}

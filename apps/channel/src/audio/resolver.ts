import { ResolutionFailedError, ShutdownRequestedError, formatError, type ResolutionAttempt } from "../errors.js";
import { isCommandMissing, runCommand, type CommandRunner } from "../utils/command.js";
import { delay } from "../utils/delay.js";

export type ResolvedAudioHandle = {
  url: string;
  format: string;
  resolvedAt: number;
};

export type AudioResolver = {
  readonly formats: readonly string[];
  resolve: (sourceUrl: string, signal?: AbortSignal) => Promise<ResolvedAudioHandle>;
};

export type AudioResolverOptions = {
  preferredFormat: string;
  ytDlpPath?: string;
  pythonPath?: string;
  runner?: CommandRunner;
  now?: () => number;
};

const fallbackFormats = ["bestaudio/best", "best"];

/** Configured format first, then the generic fallbacks; duplicates keep their first position. */
export const buildFormatPreferences = (preferredFormat: string) => {
  const formats: string[] = [];
  for (const format of [preferredFormat.trim(), ...fallbackFormats]) {
    if (format && !formats.includes(format)) {
      formats.push(format);
    }
  }
  return formats;
};

export const buildResolveArgs = (sourceUrl: string, format: string) => [
  "--no-warnings",
  "--no-playlist",
  "--extractor-args",
  "youtube:player_client=ios,web,android",
  "-f",
  format,
  "-g",
  sourceUrl
];

const firstLine = (output: string) =>
  output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0) ?? "";

export const createAudioResolver = (options: AudioResolverOptions): AudioResolver => {
  const runner = options.runner ?? runCommand;
  const ytDlpPath = options.ytDlpPath ?? "yt-dlp";
  const pythonPath = options.pythonPath ?? "python3";
  const now = options.now ?? Date.now;
  const formats = buildFormatPreferences(options.preferredFormat);

  const runYtDlp = async (args: string[], signal?: AbortSignal) => {
    try {
      return await runner(ytDlpPath, args, signal);
    } catch (error) {
      if (!isCommandMissing(error)) {
        throw error;
      }
      return runner(pythonPath, ["-m", "yt_dlp", ...args], signal);
    }
  };

  const resolve = async (sourceUrl: string, signal?: AbortSignal) => {
    const attempts: ResolutionAttempt[] = [];
    for (const format of formats) {
      if (signal?.aborted) {
        break;
      }
      try {
        const url = firstLine(await runYtDlp(buildResolveArgs(sourceUrl, format), signal));
        if (url) {
          return { url, format, resolvedAt: now() };
        }
        attempts.push({ format, reason: "no URL returned" });
      } catch (error) {
        attempts.push({ format, reason: formatError(error) });
      }
    }
    throw new ResolutionFailedError(sourceUrl, attempts);
  };

  return { formats, resolve };
};

export type RetryOptions = {
  retryDelayMs: number;
  signal?: AbortSignal;
  onFailure?: (error: ResolutionFailedError, attempt: number) => void;
};

/**
 * Calls the resolver until it succeeds, waiting `retryDelayMs` after each ResolutionFailedError.
 * There is no attempt limit; only an abort ends the loop, with ShutdownRequestedError.
 */
export const resolveUntilAvailable = async (
  resolver: AudioResolver,
  sourceUrl: string,
  options: RetryOptions
) => {
  for (let attempt = 1; ; attempt += 1) {
    if (options.signal?.aborted) {
      throw new ShutdownRequestedError();
    }
    try {
      return await resolver.resolve(sourceUrl, options.signal);
    } catch (error) {
      if (!(error instanceof ResolutionFailedError)) {
        throw error;
      }
      if (options.signal?.aborted) {
        throw new ShutdownRequestedError();
      }
      if (options.onFailure) {
        options.onFailure(error, attempt);
      } else {
        console.warn(
          `Audio: resolution attempt #${attempt} failed (${error.message}); retrying in ${options.retryDelayMs}ms`
        );
      }
      await delay(options.retryDelayMs, options.signal);
    }
  }
};

import { describe, expect, it } from "vitest";
import { findMissingTools } from "./tools.js";
import type { CommandRunner } from "./utils/command.js";

const tools = { ffmpeg: "ffmpeg", ytDlp: "yt-dlp", ytDlpPython: "python3" };
const externalAudio = { sourceUrl: "https://www.youtube.com/watch?v=live0000000", preferredFormat: "best" };

const notFound = (command: string) => Object.assign(new Error(`spawn ${command} ENOENT`), { code: "ENOENT" });

const runnerWith = (installed: string[]): CommandRunner => async (command, args) => {
  const name = command === "python3" ? `python3 ${args.slice(0, 2).join(" ")}` : command;
  if (!installed.includes(name)) {
    throw notFound(command);
  }
  return "version 1.0\n";
};

describe("findMissingTools", () => {
  it("only needs ffmpeg without an external audio source", async () => {
    await expect(findMissingTools({ tools, externalAudio: null }, runnerWith(["ffmpeg"]))).resolves.toEqual([]);
  });

  it("reports a missing ffmpeg", async () => {
    await expect(findMissingTools({ tools, externalAudio: null }, runnerWith([]))).resolves.toEqual([
      { tool: "ffmpeg", reason: "not found" }
    ]);
  });

  it("accepts the python module in place of the yt-dlp binary", async () => {
    await expect(
      findMissingTools({ tools, externalAudio }, runnerWith(["ffmpeg", "python3 -m yt_dlp"]))
    ).resolves.toEqual([]);
  });

  it("reports yt-dlp when neither form is installed", async () => {
    await expect(findMissingTools({ tools, externalAudio }, runnerWith(["ffmpeg"]))).resolves.toEqual([
      { tool: "yt-dlp", reason: "not found; python3 -m yt_dlp: not found" }
    ]);
  });
});

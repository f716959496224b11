import type { ChannelConfig } from "./config/channel.js";
import { formatError } from "./errors.js";
import { isCommandMissing, runCommand, type CommandRunner } from "./utils/command.js";

export type MissingTool = {
  tool: string;
  reason: string;
};

const probe = async (runner: CommandRunner, command: string, args: string[]) => {
  try {
    await runner(command, args);
    return null;
  } catch (error) {
    return isCommandMissing(error) ? "not found" : formatError(error);
  }
};

/** ffmpeg always; yt-dlp (binary or python module) only when an external audio source is set. */
export const findMissingTools = async (
  config: Pick<ChannelConfig, "tools" | "externalAudio">,
  runner: CommandRunner = runCommand
) => {
  const missing: MissingTool[] = [];
  const ffmpeg = await probe(runner, config.tools.ffmpeg, ["-version"]);
  if (ffmpeg) {
    missing.push({ tool: config.tools.ffmpeg, reason: ffmpeg });
  }
  if (config.externalAudio) {
    const binary = await probe(runner, config.tools.ytDlp, ["--version"]);
    if (binary) {
      const pythonModule = await probe(runner, config.tools.ytDlpPython, ["-m", "yt_dlp", "--version"]);
      if (pythonModule) {
        missing.push({ tool: config.tools.ytDlp, reason: `${binary}; ${config.tools.ytDlpPython} -m yt_dlp: ${pythonModule}` });
      }
    }
  }
  return missing;
};

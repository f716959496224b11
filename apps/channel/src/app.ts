import type { AudioResolver } from "./audio/resolver.js";
import type { ChannelConfig } from "./config/channel.js";
import { mediaExtensions } from "./library/media.js";
import { computeLibrarySignature, type WatchedDirectory } from "./library/signature.js";
import { buildPlaybackPlans, buildVideoPlaybackPlan, type PlaylistBuildOptions } from "./playlist/builder.js";
import { PipelineSupervisor } from "./pipeline/supervisor.js";
import type { ProcessLauncher } from "./pipeline/process.js";
import { StreamWatcher } from "./watcher/streamWatcher.js";

export type ChannelDeps = {
  launcher?: ProcessLauncher;
  resolver?: AudioResolver;
  random?: () => number;
};

export const playlistOptions = (config: ChannelConfig, random?: () => number): PlaylistBuildOptions => ({
  videoDir: config.library.videoDir,
  audioDir: config.library.audioDir,
  videoPlan: config.plans.videoPlan,
  audioPlan: config.plans.audioPlan,
  recursive: config.library.recursive,
  shuffle: config.library.shuffle,
  randomStart: config.library.randomStart,
  random
});

// External audio replaces the audio library, so only the video directory is watched.
export const watchedDirectories = (config: ChannelConfig): WatchedDirectory[] => {
  const video = { dir: config.library.videoDir, extensions: mediaExtensions.video };
  if (config.topology === "external-audio") {
    return [video];
  }
  return [video, { dir: config.library.audioDir, extensions: mediaExtensions.audio }];
};

export const createChannel = (config: ChannelConfig, deps: ChannelDeps = {}) => {
  const options = playlistOptions(config, deps.random);
  const prepare = async () => {
    if (config.topology === "external-audio") {
      await buildVideoPlaybackPlan(options);
    } else {
      await buildPlaybackPlans(options);
    }
  };

  const supervisor = new PipelineSupervisor({
    config,
    launcher: deps.launcher,
    resolver: deps.resolver,
    prepare
  });
  const directories = watchedDirectories(config);
  const watcher = new StreamWatcher({
    supervisor,
    computeSignature: () => computeLibrarySignature({ directories, recursive: config.library.recursive }),
    pollIntervalMs: config.timing.pollIntervalMs
  });

  return { supervisor, watcher };
};

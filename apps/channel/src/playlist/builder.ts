import { EmptyLibraryError } from "../errors.js";
import { mediaExtensions, type MediaItem, type MediaKind } from "../library/media.js";
import { listMediaFiles } from "../library/scan.js";
import { writePlaybackPlan } from "./concat.js";

export type PlaybackPlan = {
  kind: MediaKind;
  items: MediaItem[];
};

export type OrderingOptions = {
  shuffle: boolean;
  randomStart: boolean;
  random?: () => number;
};

export type PlaylistBuildOptions = OrderingOptions & {
  videoDir: string;
  audioDir: string;
  videoPlan: string;
  audioPlan: string;
  recursive: boolean;
};

export const shuffleItems = <T,>(items: readonly T[], random: () => number = Math.random) => {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
};

export const rotateItems = <T,>(items: readonly T[], offset: number) => {
  if (items.length === 0) {
    return [...items];
  }
  const start = ((offset % items.length) + items.length) % items.length;
  return [...items.slice(start), ...items.slice(0, start)];
};

/** Applies the optional shuffle, then the optional random start offset, to sorted paths. */
export const orderPaths = (sorted: readonly string[], options: OrderingOptions) => {
  const random = options.random ?? Math.random;
  const ordered = options.shuffle ? shuffleItems(sorted, random) : [...sorted];
  if (options.randomStart && ordered.length > 1) {
    return rotateItems(ordered, Math.floor(random() * ordered.length));
  }
  return ordered;
};

// One entry per line: a path with a line break would read back as a different path.
export const isPlannablePath = (filePath: string) => !/[\r\n]/.test(filePath);

export const collectPlaybackPlan = async (
  kind: MediaKind,
  dir: string,
  recursive: boolean,
  ordering: OrderingOptions
): Promise<PlaybackPlan> => {
  const listed = await listMediaFiles(dir, mediaExtensions[kind], recursive);
  const sorted = listed.filter((filePath) => {
    if (!isPlannablePath(filePath)) {
      console.warn(`Playlist: skipping ${JSON.stringify(filePath)}; line breaks cannot be written to a plan`);
      return false;
    }
    return true;
  });
  const items = orderPaths(sorted, ordering).map((filePath) => ({ path: filePath, kind }));
  return { kind, items };
};

const writePlan = async (
  kind: MediaKind,
  dir: string,
  outPath: string,
  options: PlaylistBuildOptions
) => {
  const plan = await collectPlaybackPlan(kind, dir, options.recursive, options);
  const count = await writePlaybackPlan(
    outPath,
    plan.items.map((item) => item.path)
  );
  console.log(`Playlist: wrote ${count} ${kind} entries -> ${outPath}`);
  return plan;
};

/**
 * Scans both libraries and overwrites both plan files. Both files are written before the
 * emptiness check, so a failed build leaves them in place rather than restoring the old plan.
 */
export const buildPlaybackPlans = async (options: PlaylistBuildOptions) => {
  const video = await writePlan("video", options.videoDir, options.videoPlan, options);
  const audio = await writePlan("audio", options.audioDir, options.audioPlan, options);
  if (video.items.length === 0) {
    throw new EmptyLibraryError("video", options.videoDir);
  }
  if (audio.items.length === 0) {
    throw new EmptyLibraryError("audio", options.audioDir);
  }
  return { video, audio };
};

// The external-audio channel takes its sound from the resolved URL, so only video is planned.
export const buildVideoPlaybackPlan = async (options: PlaylistBuildOptions) => {
  const video = await writePlan("video", options.videoDir, options.videoPlan, options);
  if (video.items.length === 0) {
    throw new EmptyLibraryError("video", options.videoDir);
  }
  return video;
};

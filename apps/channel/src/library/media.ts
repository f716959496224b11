import path from "node:path";

export type MediaKind = "video" | "audio";

export type MediaItem = {
  readonly path: string;
  readonly kind: MediaKind;
};

export const mediaExtensions: Record<MediaKind, ReadonlySet<string>> = {
  video: new Set([".mp4", ".m4v", ".mov", ".mkv"]),
  audio: new Set([".m4a", ".mp3", ".aac", ".wav", ".flac", ".ogg", ".opus"])
};

export const hasMediaExtension = (filePath: string, extensions: ReadonlySet<string>) =>
  extensions.has(path.extname(filePath).toLowerCase());

export const compareMediaPaths = (a: string, b: string) => {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left !== right) {
    return left < right ? -1 : 1;
  }
  // Paths differing only by case still need a stable order.
  return a < b ? -1 : a > b ? 1 : 0;
};

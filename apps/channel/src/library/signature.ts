import crypto from "node:crypto";
import fsPromises from "node:fs/promises";
import { compareMediaPaths } from "./media.js";
import { isMissing, listMediaFiles } from "./scan.js";

export type WatchedDirectory = {
  dir: string;
  extensions: ReadonlySet<string>;
};

export type SignatureOptions = {
  directories: readonly WatchedDirectory[];
  recursive: boolean;
};

type FileFingerprint = {
  resolvedPath: string;
  size: number;
  mtimeSeconds: number;
};

const fingerprint = async (filePath: string): Promise<FileFingerprint | null> => {
  try {
    const resolvedPath = await fsPromises.realpath(filePath);
    const stat = await fsPromises.stat(resolvedPath);
    return { resolvedPath, size: stat.size, mtimeSeconds: Math.floor(stat.mtimeMs / 1000) };
  } catch (error) {
    // Deleted between listing and stat: already gone, the next poll sees the final state.
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
};

/**
 * Hex sha256 over the sorted (resolved path, size, whole-second mtime) of every media file in
 * the watched directories.
 */
export const computeLibrarySignature = async (options: SignatureOptions) => {
  const fingerprints: FileFingerprint[] = [];
  for (const { dir, extensions } of options.directories) {
    const files = await listMediaFiles(dir, extensions, options.recursive);
    for (const filePath of files) {
      const entry = await fingerprint(filePath);
      if (entry) {
        fingerprints.push(entry);
      }
    }
  }
  fingerprints.sort((a, b) => compareMediaPaths(a.resolvedPath, b.resolvedPath));

  const hash = crypto.createHash("sha256");
  for (const entry of fingerprints) {
    hash.update(`${entry.resolvedPath}\t${entry.size}\t${entry.mtimeSeconds}\n`, "utf8");
  }
  return hash.digest("hex");
};

export const signaturesEqual = (a: string | null, b: string | null) => a !== null && a === b;

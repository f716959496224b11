import fsPromises from "node:fs/promises";
import path from "node:path";
import { compareMediaPaths, hasMediaExtension } from "./media.js";

export const isMissing = (error: unknown) =>
  error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");

const listDirectory = async (dir: string) => {
  try {
    return await fsPromises.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isMissing(error)) {
      return [];
    }
    throw error;
  }
};

// Symlinked files count, dangling links and linked directories do not.
const isLinkedFile = async (linkPath: string) => {
  try {
    return (await fsPromises.stat(linkPath)).isFile();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
};

const collectFiles = async (dir: string, recursive: boolean, found: string[]) => {
  for (const entry of await listDirectory(dir)) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) {
        await collectFiles(entryPath, recursive, found);
      }
      continue;
    }
    if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkedFile(entryPath)))) {
      found.push(entryPath);
    }
  }
};

/**
 * Lists media files under `dir` as absolute paths, sorted case-insensitively.
 * A directory that does not exist yields an empty list.
 */
export const listMediaFiles = async (
  dir: string,
  extensions: ReadonlySet<string>,
  recursive: boolean
) => {
  const found: string[] = [];
  await collectFiles(path.resolve(dir), recursive, found);
  return found.filter((filePath) => hasMediaExtension(filePath, extensions)).sort(compareMediaPaths);
};

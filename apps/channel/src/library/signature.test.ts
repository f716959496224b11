import fsPromises from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mediaExtensions } from "./media.js";
import { computeLibrarySignature, signaturesEqual, type SignatureOptions } from "./signature.js";

let tempDir: string;

const write = async (relative: string, body = "x") => {
  const filePath = path.join(tempDir, relative);
  await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
  await fsPromises.writeFile(filePath, body);
  return filePath;
};

const options = (recursive = false): SignatureOptions => ({
  directories: [
    { dir: path.join(tempDir, "video"), extensions: mediaExtensions.video },
    { dir: path.join(tempDir, "audio"), extensions: mediaExtensions.audio }
  ],
  recursive
});

beforeEach(async () => {
  tempDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "loopcast-sig-"));
  await write("video/a.mp4", "aaaa");
  await write("audio/b.mp3", "bbbb");
});

afterEach(async () => {
  await fsPromises.rm(tempDir, { recursive: true, force: true });
});

describe("computeLibrarySignature", () => {
  it("is deterministic for unchanged contents", async () => {
    const first = await computeLibrarySignature(options());
    const second = await computeLibrarySignature(options());
    expect(first).toMatch(/^[0-9a-f]{64}$/);
    expect(signaturesEqual(first, second)).toBe(true);
  });

  it("does not depend on the order directories are listed in", async () => {
    const forward = await computeLibrarySignature(options());
    const reversed = await computeLibrarySignature({
      directories: [...options().directories].reverse(),
      recursive: false
    });
    expect(reversed).toBe(forward);
  });

  it("changes when a file size changes", async () => {
    const before = await computeLibrarySignature(options());
    const target = path.join(tempDir, "video", "a.mp4");
    const { mtime } = await fsPromises.stat(target);
    await fsPromises.writeFile(target, "aaaaaaaa");
    await fsPromises.utimes(target, mtime, mtime);
    expect(await computeLibrarySignature(options())).not.toBe(before);
  });

  it("changes when a file mtime changes", async () => {
    const target = path.join(tempDir, "audio", "b.mp3");
    await fsPromises.utimes(target, new Date(1_700_000_000_000), new Date(1_700_000_000_000));
    const before = await computeLibrarySignature(options());
    await fsPromises.utimes(target, new Date(1_700_000_100_000), new Date(1_700_000_100_000));
    expect(await computeLibrarySignature(options())).not.toBe(before);
  });

  it("changes when a media file is added to the audio directory", async () => {
    const before = await computeLibrarySignature(options());
    await write("audio/c.flac");
    expect(await computeLibrarySignature(options())).not.toBe(before);
  });

  it("ignores files without a recognized extension", async () => {
    const before = await computeLibrarySignature(options());
    await write("video/readme.txt");
    await write("audio/cover.jpg");
    expect(await computeLibrarySignature(options())).toBe(before);
  });

  it("only looks into subdirectories when recursive", async () => {
    const flat = await computeLibrarySignature(options());
    await write("video/season/ep1.mkv");
    expect(await computeLibrarySignature(options())).toBe(flat);
    expect(await computeLibrarySignature(options(true))).not.toBe(await computeLibrarySignature(options(false)));
  });

  it("leaves out a file that disappears between listing and stat", async () => {
    const expected = await computeLibrarySignature(options());
    const vanishing = await write("video/gone.mp4", "gggg");

    const realpath = fsPromises.realpath;
    vi.spyOn(fsPromises, "realpath").mockImplementation(async (target, encoding) => {
      if (target === vanishing) {
        throw Object.assign(new Error(`ENOENT: no such file or directory, realpath '${vanishing}'`), {
          code: "ENOENT"
        });
      }
      return realpath(target, encoding);
    });

    try {
      await expect(computeLibrarySignature(options())).resolves.toBe(expected);
      expect(fsPromises.realpath).toHaveBeenCalledWith(vanishing);
    } finally {
      vi.restoreAllMocks();
    }
  });

  it("skips dangling links and missing directories", async () => {
    const before = await computeLibrarySignature(options());
    await fsPromises.symlink(path.join(tempDir, "nowhere.mp4"), path.join(tempDir, "video", "gone.mp4"));
    expect(await computeLibrarySignature(options())).toBe(before);

    const missing = await computeLibrarySignature({
      directories: [{ dir: path.join(tempDir, "absent"), extensions: mediaExtensions.video }],
      recursive: false
    });
    const empty = await computeLibrarySignature({ directories: [], recursive: false });
    expect(missing).toBe(empty);
  });
});

describe("signaturesEqual", () => {
  it("compares digests exactly and never matches a missing value", () => {
    expect(signaturesEqual("abc", "abc")).toBe(true);
    expect(signaturesEqual("abc", "abd")).toBe(false);
    expect(signaturesEqual(null, null)).toBe(false);
    expect(signaturesEqual(null, "abc")).toBe(false);
  });
});

import fsPromises from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createChannel, watchedDirectories } from "./app.js";
import { loadChannelConfig } from "./config/channel.js";
import { EmptyLibraryError } from "./errors.js";
import { createFakeLauncher } from "./testing/fakeProcess.js";

let tempDir: string;

const write = async (relative: string) => {
  const filePath = path.join(tempDir, relative);
  await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
  await fsPromises.writeFile(filePath, "media");
  return filePath;
};

beforeEach(async () => {
  tempDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "loopcast-app-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fsPromises.rm(tempDir, { recursive: true, force: true });
});

describe("createChannel", () => {
  it("plans the library, starts the pipeline and restarts on a library change", async () => {
    const first = await write("a.mp4");
    const song = await write("audio/x.mp3");
    const config = loadChannelConfig({ MODE: "vlc_ts" }, tempDir);
    const fake = createFakeLauncher();
    const { supervisor, watcher } = createChannel(config, { launcher: fake.launcher });

    await watcher.start();

    expect(fake.children).toHaveLength(1);
    expect(fake.children[0].arg("-listen")).toBe("1");
    expect(await fsPromises.readFile(config.plans.videoPlan, "utf8")).toBe(`file '${first}'\n`);
    expect(await fsPromises.readFile(config.plans.audioPlan, "utf8")).toBe(`file '${song}'\n`);

    const second = await write("b.mp4");
    await watcher.tick();

    expect(fake.children).toHaveLength(2);
    expect(fake.children[0].signals).toEqual(["SIGTERM"]);
    expect(await fsPromises.readFile(config.plans.videoPlan, "utf8")).toBe(`file '${first}'\nfile '${second}'\n`);
    expect(supervisor.snapshot()).toMatchObject({ state: "running", generation: 2 });

    await watcher.stop();
    expect(fake.alive()).toEqual([]);
  });

  it("fails the first start on an empty video library", async () => {
    await write("audio/x.mp3");
    const config = loadChannelConfig({ MODE: "vlc_ts" }, tempDir);
    const fake = createFakeLauncher();
    const { watcher } = createChannel(config, { launcher: fake.launcher });

    await expect(watcher.start()).rejects.toBeInstanceOf(EmptyLibraryError);
    expect(fake.children).toEqual([]);
  });
});

describe("watchedDirectories", () => {
  it("ignores the audio library when audio comes from an external source", () => {
    const config = loadChannelConfig({ YOUTUBE_URL: "https://www.youtube.com/watch?v=live0000000" }, "/srv/channel");
    expect(watchedDirectories(config).map((entry) => entry.dir)).toEqual([path.resolve("/srv/channel")]);
  });
});

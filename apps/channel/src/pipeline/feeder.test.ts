import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createFakeLauncher, settle } from "../testing/fakeProcess.js";
import { FeederLoop } from "./feeder.js";

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

const inputs = (children: { args: string[] }[]) => children.map((child) => child.args[1]);

describe("FeederLoop", () => {
  it("skips a failing file and keeps looping the plan", async () => {
    const fake = createFakeLauncher();
    const feeder = new FeederLoop({
      role: "video-loop",
      generation: 1,
      entries: ["/m/a.mp4", "/m/missing.mp4", "/m/b.mp4"],
      command: "ffmpeg",
      buildArgs: (filePath) => ["-i", filePath],
      launcher: fake.launcher,
      idleDelayMs: 50,
      fileExists: async (filePath) => !filePath.includes("missing")
    });

    await settle();
    expect(inputs(fake.children)).toEqual(["/m/a.mp4"]);

    fake.children[0].exit(1);
    await settle();
    expect(inputs(fake.children)).toEqual(["/m/a.mp4", "/m/b.mp4"]);
    expect(feeder.isAlive()).toBe(true);
    expect(console.warn).toHaveBeenCalledWith(
      "Feeder video-loop#1: Failed to transcode /m/a.mp4: exited with code 1 (no signal); skipping"
    );

    fake.children[1].exit(0);
    await settle();
    expect(inputs(fake.children)).toEqual(["/m/a.mp4", "/m/b.mp4", "/m/a.mp4"]);
    expect(feeder.completedPasses).toBe(1);
    expect(feeder.pid).toBe(fake.children[2].pid);

    await feeder.stop(1000);
    expect(fake.children[2].signals).toEqual(["SIGTERM"]);
    expect(feeder.isAlive()).toBe(false);
    expect(fake.alive()).toEqual([]);
  });

  it("absorbs a launcher that throws", async () => {
    let calls = 0;
    const fake = createFakeLauncher();
    const feeder = new FeederLoop({
      role: "audio-loop",
      generation: 2,
      entries: ["/m/bad.mp3", "/m/good.mp3"],
      command: "ffmpeg",
      buildArgs: (filePath) => ["-i", filePath],
      launcher: (command, args) => {
        calls += 1;
        if (calls === 1) {
          throw new Error("spawn EAGAIN");
        }
        return fake.launcher(command, args);
      },
      idleDelayMs: 50,
      fileExists: async () => true
    });

    await settle();
    expect(inputs(fake.children)).toEqual(["/m/good.mp3"]);
    expect(feeder.isAlive()).toBe(true);
    await feeder.stop(1000);
  });

  it("waits between passes when nothing in the plan can play", async () => {
    vi.useFakeTimers();
    const fake = createFakeLauncher();
    const feeder = new FeederLoop({
      role: "audio-loop",
      generation: 3,
      entries: ["/m/gone.mp3"],
      command: "ffmpeg",
      buildArgs: (filePath) => ["-i", filePath],
      launcher: fake.launcher,
      idleDelayMs: 2000,
      fileExists: async () => false
    });

    await vi.advanceTimersByTimeAsync(0);
    expect(feeder.completedPasses).toBe(1);
    await vi.advanceTimersByTimeAsync(1999);
    expect(feeder.completedPasses).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(feeder.completedPasses).toBe(2);
    expect(fake.children).toEqual([]);

    await expect(feeder.stop(1000)).resolves.toEqual({ code: 0, signal: null, error: null });
    expect(feeder.isAlive()).toBe(false);
  });
});

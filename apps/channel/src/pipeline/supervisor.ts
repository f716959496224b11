import fsPromises from "node:fs/promises";
import {
  createAudioResolver,
  resolveUntilAvailable,
  type AudioResolver,
  type ResolvedAudioHandle
} from "../audio/resolver.js";
import type { ChannelConfig, Topology } from "../config/channel.js";
import { EmptyLibraryError, ShutdownRequestedError, SubprocessCrashedError, formatError } from "../errors.js";
import type { MediaKind } from "../library/media.js";
import { readPlaybackPlan } from "../playlist/concat.js";
import { FeederLoop } from "./feeder.js";
import {
  buildAudioFeedArgs,
  buildCombinedArgs,
  buildExternalAudioArgs,
  buildMuxerArgs,
  buildVideoFeedArgs
} from "./ffmpegArgs.js";
import {
  ManagedProcess,
  describeExit,
  spawnProcess,
  type PipelineProcess,
  type ProcessExit,
  type ProcessLauncher,
  type ProcessRole
} from "./process.js";

export type SupervisorState = "stopped" | "starting" | "running" | "crashed" | "source-expired" | "stopping";

export type SupervisorConfig = Pick<
  ChannelConfig,
  "topology" | "plans" | "output" | "encode" | "transport" | "externalAudio" | "timing" | "tools"
>;

export type SupervisorOptions = {
  config: SupervisorConfig;
  launcher?: ProcessLauncher;
  resolver?: AudioResolver;
  /** Runs before every generation, e.g. to rebuild the playback plans. */
  prepare?: () => Promise<void>;
  readPlan?: (planPath: string) => Promise<string[]>;
  fileExists?: (filePath: string) => Promise<boolean>;
  now?: () => number;
};

export type ProcessSnapshot = {
  role: ProcessRole;
  pid: number | null;
  alive: boolean;
};

export type SupervisorSnapshot = {
  state: SupervisorState;
  topology: Topology;
  generation: number | null;
  generationsStarted: number;
  startedAt: number | null;
  processes: ProcessSnapshot[];
  audio: { format: string; resolvedAt: number } | null;
  lastExit: string | null;
  lastError: string | null;
};

/** What the watcher needs from a supervisor. */
export type SupervisedPipeline = {
  start(): Promise<void>;
  restart(reason: string): Promise<void>;
  stop(reason?: string): Promise<void>;
  isActive(): boolean;
};

type Generation = {
  id: number;
  processes: PipelineProcess[];
  primary: PipelineProcess;
  startedAt: number;
  audio: ResolvedAudioHandle | null;
  stopping: boolean;
};

/**
 * Owns at most one generation of ffmpeg processes. Operations run one at a time in call order;
 * a generation is fully reaped before the next one spawns.
 */
export class PipelineSupervisor implements SupervisedPipeline {
  private readonly config: SupervisorConfig;
  private readonly launcher: ProcessLauncher;
  private readonly resolver: AudioResolver | null;
  private readonly options: SupervisorOptions;
  private readonly now: () => number;
  private queue: Promise<void> = Promise.resolve();
  private state: SupervisorState = "stopped";
  private current: Generation | null = null;
  private generationCounter = 0;
  private wanted = false;
  private startController: AbortController | null = null;
  private restartTimer: NodeJS.Timeout | null = null;
  private lastExit: string | null = null;
  private lastError: string | null = null;

  constructor(options: SupervisorOptions) {
    this.options = options;
    this.config = options.config;
    this.launcher = options.launcher ?? spawnProcess;
    this.now = options.now ?? Date.now;
    const externalAudio = options.config.externalAudio;
    this.resolver =
      options.resolver ??
      (externalAudio
        ? createAudioResolver({
            preferredFormat: externalAudio.preferredFormat,
            ytDlpPath: options.config.tools.ytDlp,
            pythonPath: options.config.tools.ytDlpPython
          })
        : null);
    if (this.config.topology === "external-audio" && (!externalAudio || !this.resolver)) {
      throw new Error("external-audio topology needs a source URL");
    }
  }

  get currentState() {
    return this.state;
  }

  isActive() {
    return this.current !== null || this.startController !== null || this.restartTimer !== null;
  }

  snapshot(): SupervisorSnapshot {
    const generation = this.current;
    return {
      state: this.state,
      topology: this.config.topology,
      generation: generation?.id ?? null,
      generationsStarted: this.generationCounter,
      startedAt: generation?.startedAt ?? null,
      processes:
        generation?.processes.map((member) => ({
          role: member.role,
          pid: member.pid ?? null,
          alive: member.isAlive()
        })) ?? [],
      audio: generation?.audio
        ? { format: generation.audio.format, resolvedAt: generation.audio.resolvedAt }
        : null,
      lastExit: this.lastExit,
      lastError: this.lastError
    };
  }

  start() {
    this.wanted = true;
    return this.enqueue(() => this.launch());
  }

  restart(reason: string) {
    this.wanted = true;
    this.clearRestartTimer();
    this.startController?.abort();
    return this.enqueue(async () => {
      await this.teardown(reason);
      await this.launch();
    });
  }

  stop(reason = "shutdown") {
    this.wanted = false;
    this.clearRestartTimer();
    this.startController?.abort();
    return this.enqueue(() => this.teardown(reason));
  }

  private enqueue(task: () => Promise<void>) {
    const run = this.queue.then(task);
    // A failed task is reported to its caller; later tasks still run.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private clearRestartTimer() {
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
  }

  private async launch() {
    if (!this.wanted || this.current) return;
    this.clearRestartTimer();
    const controller = new AbortController();
    this.startController = controller;
    this.state = "starting";
    try {
      await this.options.prepare?.();
      const generation = await this.launchGeneration(controller.signal);
      this.current = generation;
      this.state = "running";
      this.lastError = null;
      for (const member of generation.processes) {
        void member.exited.then((exit) => this.onExit(generation, member, exit));
      }
      const pids = generation.processes.map((member) => member.pid ?? "-").join(", ");
      console.log(
        `Supervisor: generation #${generation.id} running (${this.config.topology}; pids ${pids})`
      );
    } catch (error) {
      this.state = "stopped";
      if (error instanceof ShutdownRequestedError) {
        console.log("Supervisor: start cancelled");
        return;
      }
      this.lastError = formatError(error);
      throw error;
    } finally {
      if (this.startController === controller) {
        this.startController = null;
      }
    }
  }

  private async readNonEmptyPlan(kind: MediaKind, planPath: string) {
    const entries = await (this.options.readPlan ?? readPlaybackPlan)(planPath);
    if (entries.length === 0) {
      throw new EmptyLibraryError(kind, planPath);
    }
    return entries;
  }

  private async launchGeneration(signal: AbortSignal): Promise<Generation> {
    const { plans, output, encode, timing, tools, transport } = this.config;
    if (output.kind === "hls") {
      await fsPromises.mkdir(output.dir, { recursive: true });
    }
    const videoEntries = await this.readNonEmptyPlan("video", plans.videoPlan);
    const audioEntries =
      this.config.topology === "external-audio" ? [] : await this.readNonEmptyPlan("audio", plans.audioPlan);

    let audio: ResolvedAudioHandle | null = null;
    if (this.config.topology === "external-audio" && this.resolver && this.config.externalAudio) {
      audio = await resolveUntilAvailable(this.resolver, this.config.externalAudio.sourceUrl, {
        retryDelayMs: timing.restartDelayMs,
        signal
      });
      console.log(`Supervisor: resolved audio with format ${audio.format}`);
    }
    if (signal.aborted) {
      throw new ShutdownRequestedError();
    }

    this.generationCounter += 1;
    const id = this.generationCounter;
    const label = (role: ProcessRole) => `${role}#${id}`;
    const spawnManaged = (role: ProcessRole, args: string[]) =>
      new ManagedProcess(role, this.launcher(tools.ffmpeg, args), label(role));

    let processes: PipelineProcess[];
    if (this.config.topology === "split") {
      // The muxer listens first so the feeders' first packets have somewhere to go.
      const muxer = spawnManaged(
        "muxer",
        buildMuxerArgs({
          videoPort: transport.videoPort,
          audioPort: transport.audioPort,
          logLevel: encode.logLevel,
          output
        })
      );
      const feeder = (role: "video-loop" | "audio-loop", entries: string[], buildArgs: (filePath: string) => string[]) =>
        new FeederLoop({
          role,
          generation: id,
          entries,
          command: tools.ffmpeg,
          buildArgs,
          launcher: this.launcher,
          idleDelayMs: timing.restartDelayMs,
          fileExists: this.options.fileExists
        });
      processes = [
        muxer,
        feeder("video-loop", videoEntries, (filePath) => buildVideoFeedArgs(filePath, encode, transport.videoPort)),
        feeder("audio-loop", audioEntries, (filePath) => buildAudioFeedArgs(filePath, encode, transport.audioPort))
      ];
    } else if (audio) {
      processes = [
        spawnManaged(
          "single-pipeline",
          buildExternalAudioArgs({ videoPlan: plans.videoPlan, audioUrl: audio.url, encode, output })
        )
      ];
    } else {
      processes = [
        spawnManaged(
          "single-pipeline",
          buildCombinedArgs({ videoPlan: plans.videoPlan, audioPlan: plans.audioPlan, encode, output })
        )
      ];
    }

    return { id, processes, primary: processes[0], startedAt: this.now(), audio, stopping: false };
  }

  private onExit(generation: Generation, member: PipelineProcess, exit: ProcessExit) {
    if (generation.stopping || this.current !== generation) return;
    const crash = new SubprocessCrashedError(member.role, generation.id, exit.code, exit.signal);
    this.lastExit = `${member.role}#${generation.id}: ${describeExit(exit)}`;
    // A resolved URL that stops playing has usually expired.
    this.state = generation.audio && member === generation.primary ? "source-expired" : "crashed";
    console.error(`Supervisor: ${crash.message}`);
    this.enqueue(() => this.recover(generation)).catch((error: unknown) => {
      console.error(`Supervisor: recovery failed: ${formatError(error)}`);
    });
  }

  private async recover(generation: Generation) {
    if (this.current !== generation) return;
    generation.stopping = true;
    await Promise.all(generation.processes.map((member) => member.stop(0)));
    this.current = null;
    if (!this.wanted) {
      this.state = "stopped";
      return;
    }
    const delayMs = this.config.timing.restartDelayMs;
    console.log(`Supervisor: restarting in ${delayMs}ms`);
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      this.enqueue(() => this.launch()).catch((error: unknown) => {
        console.error(`Supervisor: restart failed: ${formatError(error)}`);
      });
    }, delayMs);
  }

  private async teardown(reason: string) {
    const generation = this.current;
    if (!generation) {
      this.state = "stopped";
      return;
    }
    generation.stopping = true;
    this.state = "stopping";
    console.log(`Supervisor: stopping generation #${generation.id} (${reason})`);
    await Promise.all(generation.processes.map((member) => member.stop(this.config.timing.stopGraceMs)));
    this.current = null;
    this.state = "stopped";
  }
}

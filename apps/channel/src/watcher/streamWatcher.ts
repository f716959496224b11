import { formatError } from "../errors.js";
import { signaturesEqual } from "../library/signature.js";
import type { SupervisedPipeline } from "../pipeline/supervisor.js";

export type StreamWatcherOptions = {
  supervisor: SupervisedPipeline;
  computeSignature: () => Promise<string>;
  pollIntervalMs: number;
  now?: () => number;
};

export type WatcherSnapshot = {
  running: boolean;
  pollIntervalMs: number;
  lastPollAt: number | null;
  signature: string | null;
  restarts: number;
  lastError: string | null;
};

/**
 * Polls the library signature and the supervisor's liveness. Ticks never overlap: the next
 * one is scheduled only after the previous one settles.
 */
export class StreamWatcher {
  private readonly supervisor: SupervisedPipeline;
  private readonly computeSignature: () => Promise<string>;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private pending: Promise<void> = Promise.resolve();
  private signature: string | null = null;
  private lastPollAt: number | null = null;
  private restarts = 0;
  private lastError: string | null = null;

  constructor(options: StreamWatcherOptions) {
    this.supervisor = options.supervisor;
    this.computeSignature = options.computeSignature;
    this.pollIntervalMs = options.pollIntervalMs;
    this.now = options.now ?? Date.now;
  }

  snapshot(): WatcherSnapshot {
    return {
      running: this.running,
      pollIntervalMs: this.pollIntervalMs,
      lastPollAt: this.lastPollAt,
      signature: this.signature,
      restarts: this.restarts,
      lastError: this.lastError
    };
  }

  /** Rejects, without scheduling any poll, when the first start fails. */
  async start() {
    if (this.running) return;
    this.running = true;
    this.signature = await this.measure();
    try {
      await this.supervisor.start();
    } catch (error) {
      this.running = false;
      this.lastError = formatError(error);
      throw error;
    }
    console.log(`Watcher: polling every ${this.pollIntervalMs}ms`);
    this.schedule();
  }

  async stop(reason = "shutdown") {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const stopping = this.supervisor.stop(reason);
    await this.pending;
    await stopping;
  }

  private schedule() {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.pending = this.tick().then(() => this.schedule());
    }, this.pollIntervalMs);
  }

  async tick() {
    this.lastPollAt = this.now();
    if (!this.supervisor.isActive()) {
      const signature = await this.measure();
      if (signature === null || !this.running) return;
      this.signature = signature;
      console.warn("Watcher: pipeline is not running; restarting");
      await this.restartSupervisor("pipeline-exited");
      return;
    }
    const signature = await this.measure();
    if (signature === null || !this.running) return;
    if (this.signature === null) {
      this.signature = signature;
      return;
    }
    if (signaturesEqual(signature, this.signature)) return;
    console.log("Watcher: library changed; restarting");
    this.signature = signature;
    await this.restartSupervisor("library-changed");
  }

  private async restartSupervisor(reason: string) {
    try {
      await this.supervisor.restart(reason);
      this.restarts += 1;
      this.lastError = null;
    } catch (error) {
      this.lastError = formatError(error);
      console.error(`Watcher: restart (${reason}) failed: ${this.lastError}`);
    }
  }

  private async measure() {
    try {
      return await this.computeSignature();
    } catch (error) {
      console.error(`Watcher: could not read the library: ${formatError(error)}`);
      return null;
    }
  }
}

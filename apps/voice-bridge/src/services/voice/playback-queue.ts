import type { Logger } from "pino";
import type { AudioPlayback } from "./types.js";

export interface PlaybackQueueOptions {
  sink: AudioPlayback;
  /** Output rate in bytes per second, used to estimate when the device runs dry. */
  bytesPerSecond: number;
  drainGraceMs: number;
  logger: Logger;
  onStart?: () => void;
  onDrained?: () => void;
  now?: () => number;
}

/**
 * Feeds peer audio to the playback sink one chunk at a time and reports when
 * the speaker has gone quiet. A sink accepts data faster than it plays it, so
 * the drain notice waits for the estimated end of the written audio plus a
 * grace period.
 */
export class PlaybackQueue {
  private options: PlaybackQueueOptions;
  private now: () => number;
  private pending: Buffer[] = [];
  private pumping = false;
  private playing = false;
  private stopped = false;
  private generation = 0;
  private playheadEndsAt = 0;
  private drainTimer: NodeJS.Timeout | null = null;
  private ready: Promise<void> = Promise.resolve();

  constructor(options: PlaybackQueueOptions) {
    this.options = options;
    this.now = options.now ?? (() => Date.now());
  }

  /** True from the first queued chunk until the drain notice. */
  get active(): boolean {
    return this.playing;
  }

  get pendingChunks(): number {
    return this.pending.length;
  }

  async start(): Promise<void> {
    await this.options.sink.start();
  }

  enqueue(chunk: Buffer): void {
    if (this.stopped || chunk.length === 0) {
      return;
    }

    this.cancelDrainTimer();
    if (!this.playing) {
      this.playing = true;
      this.options.onStart?.();
    }

    this.pending.push(chunk);
    if (!this.pumping) {
      this.pump().catch((error: unknown) => {
        this.options.logger.error({ error }, "audio playback failed");
      });
    }
  }

  /** Discards queued and buffered audio; the sink is restarted empty. */
  clear(): void {
    if (this.stopped) {
      return;
    }

    const wasPlaying = this.playing;
    this.resetQueue();
    const { sink } = this.options;
    this.ready = this.ready
      .then(async () => {
        await sink.stop();
        await sink.start();
      })
      .catch((error: unknown) => {
        this.options.logger.error({ error }, "audio playback restart failed");
      });

    if (wasPlaying) {
      this.options.onDrained?.();
    }
  }

  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.resetQueue();
    await this.ready;
    await this.options.sink.stop();
  }

  private resetQueue(): void {
    this.generation += 1;
    this.pending = [];
    this.pumping = false;
    this.playing = false;
    this.playheadEndsAt = 0;
    this.cancelDrainTimer();
  }

  private async pump(): Promise<void> {
    const generation = this.generation;
    this.pumping = true;

    try {
      await this.ready;
      while (generation === this.generation) {
        const chunk = this.pending.shift();
        if (!chunk) {
          break;
        }
        const startsAt = Math.max(this.now(), this.playheadEndsAt);
        this.playheadEndsAt = startsAt + (chunk.length / this.options.bytesPerSecond) * 1000;
        await this.options.sink.write(chunk);
      }
    } finally {
      if (generation === this.generation) {
        this.pumping = false;
      }
    }

    if (generation === this.generation && !this.stopped) {
      this.scheduleDrain();
    }
  }

  private scheduleDrain(): void {
    this.cancelDrainTimer();
    const remaining = Math.max(0, this.playheadEndsAt - this.now());
    this.drainTimer = setTimeout(() => {
      this.drainTimer = null;
      if (this.pending.length > 0 || this.pumping || !this.playing) {
        return;
      }
      this.playing = false;
      this.playheadEndsAt = 0;
      this.options.onDrained?.();
    }, remaining + this.options.drainGraceMs);
  }

  private cancelDrainTimer(): void {
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
  }
}

import { spawn, type ChildProcess } from "node:child_process";
import type { Logger } from "pino";
import type { AudioCapture, AudioCaptureHooks, AudioPlayback } from "./types.js";

const BYTES_PER_SAMPLE = 2;
const KILL_GRACE_MS = 500;

/** sox arguments for headerless signed 16-bit mono PCM on stdin/stdout. */
export function rawPcmArgs(sampleRateHz: number): string[] {
  return ["-q", "-t", "raw", "-r", String(sampleRateHz), "-e", "signed-integer", "-b", "16", "-c", "1", "-"];
}

/** Re-cuts an arbitrary byte stream into fixed-size frames. */
export class PcmFramer {
  private pending: Buffer = Buffer.alloc(0);
  private frameBytes: number;

  constructor(frameBytes: number) {
    this.frameBytes = frameBytes;
  }

  push(chunk: Buffer): Buffer[] {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const frames: Buffer[] = [];
    let offset = 0;
    while (data.length - offset >= this.frameBytes) {
      frames.push(data.subarray(offset, offset + this.frameBytes));
      offset += this.frameBytes;
    }
    this.pending = Buffer.from(data.subarray(offset));
    return frames;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}

function waitForSpawn(proc: ChildProcess, command: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onSpawn = () => {
      proc.off("error", onError);
      resolve();
    };
    const onError = (error: Error) => {
      proc.off("spawn", onSpawn);
      reject(new Error(`audio_process_spawn_failed: ${command}: ${error.message}`, { cause: error }));
    };
    proc.once("spawn", onSpawn);
    proc.once("error", onError);
  });
}

function stopProcess(proc: ChildProcess): Promise<void> {
  if (proc.exitCode !== null || proc.signalCode !== null) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve) => {
    const forceTimer = setTimeout(() => {
      proc.kill("SIGKILL");
    }, KILL_GRACE_MS);
    proc.once("exit", () => {
      clearTimeout(forceTimer);
      resolve();
    });
    proc.kill("SIGTERM");
  });
}

function deviceEnv(device: string | undefined): NodeJS.ProcessEnv {
  // sox reads the device override from AUDIODEV.
  return device ? { ...process.env, AUDIODEV: device } : process.env;
}

export interface SoxCaptureOptions {
  command: string;
  sampleRateHz: number;
  chunkSamples: number;
  device?: string;
  logger: Logger;
}

export class SoxCapture implements AudioCapture {
  readonly device: string;
  private options: SoxCaptureOptions;
  private proc: ChildProcess | null = null;

  constructor(options: SoxCaptureOptions) {
    this.options = options;
    this.device = options.device ?? "default";
  }

  async start(hooks: AudioCaptureHooks): Promise<void> {
    if (this.proc) {
      return;
    }

    const { command, sampleRateHz, chunkSamples, device, logger } = this.options;
    const framer = new PcmFramer(chunkSamples * BYTES_PER_SAMPLE);
    const proc = spawn(command, rawPcmArgs(sampleRateHz), {
      stdio: ["ignore", "pipe", "pipe"],
      env: deviceEnv(device)
    });

    await waitForSpawn(proc, command);
    this.proc = proc;

    proc.stdout?.on("data", (chunk: Buffer) => {
      for (const frame of framer.push(chunk)) {
        hooks.onFrame(frame);
      }
    });

    proc.stderr?.on("data", (chunk: Buffer) => {
      logger.debug({ stderr: chunk.toString("utf8").trim() }, "audio capture stderr");
    });

    proc.on("error", (error: Error) => {
      hooks.onError(error);
    });

    proc.on("exit", (code, signal) => {
      if (this.proc !== proc) {
        return;
      }
      this.proc = null;
      hooks.onError(new Error(`audio_capture_exited: ${code ?? signal ?? "unknown"}`));
    });

    logger.info({ device: this.device, sample_rate_hz: sampleRateHz }, "audio capture started");
  }

  async stop(): Promise<void> {
    const proc = this.proc;
    this.proc = null;
    if (proc) {
      await stopProcess(proc);
    }
  }
}

export interface SoxPlaybackOptions {
  command: string;
  sampleRateHz: number;
  logger: Logger;
}

export class SoxPlayback implements AudioPlayback {
  private options: SoxPlaybackOptions;
  private proc: ChildProcess | null = null;

  constructor(options: SoxPlaybackOptions) {
    this.options = options;
  }

  async start(): Promise<void> {
    if (this.proc) {
      return;
    }

    const { command, sampleRateHz, logger } = this.options;
    const proc = spawn(command, rawPcmArgs(sampleRateHz), {
      stdio: ["pipe", "ignore", "pipe"]
    });

    await waitForSpawn(proc, command);
    this.proc = proc;

    proc.stdin?.on("error", (error: Error) => {
      logger.debug({ error: error.message }, "audio playback stdin closed");
    });

    proc.stderr?.on("data", (chunk: Buffer) => {
      logger.debug({ stderr: chunk.toString("utf8").trim() }, "audio playback stderr");
    });

    proc.on("exit", (code, signal) => {
      if (this.proc !== proc) {
        return;
      }
      this.proc = null;
      logger.warn({ code, signal }, "audio playback process exited");
    });
  }

  write(chunk: Buffer): Promise<void> {
    const stdin = this.proc?.stdin;
    if (!stdin || stdin.destroyed) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      stdin.write(chunk, (error) => {
        if (error) {
          this.options.logger.debug({ error: error.message }, "audio playback write dropped");
        }
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const proc = this.proc;
    this.proc = null;
    if (!proc) {
      return;
    }
    proc.stdin?.destroy();
    await stopProcess(proc);
  }
}

import { promises as fs } from "fs";
import { tmpdir } from "os";
import path from "path";
import { spawn, spawnSync } from "child_process";
import type { AudioOutputPort, ToneOptions } from "../../ports/audio/AudioOutputPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";

interface AudioPlayerCandidate {
  command: string;
  makeArgs: (file: string) => string[];
}

const SAMPLE_RATE = 24000;

function candidates(): AudioPlayerCandidate[] {
  const ffplay: AudioPlayerCandidate = {
    command: "ffplay",
    makeArgs: (file) => ["-autoexit", "-nodisp", "-loglevel", "error", file],
  };

  if (process.platform === "darwin") {
    return [{ command: "afplay", makeArgs: (file) => [file] }, ffplay];
  }

  return [
    { command: "aplay", makeArgs: (file) => ["-q", file] },
    { command: "paplay", makeArgs: (file) => [file] },
    ffplay,
    { command: "play", makeArgs: (file) => ["-q", file] },
  ];
}

export class PlayerAudioOutput implements AudioOutputPort {
  private detected: AudioPlayerCandidate | null | undefined;
  private readonly toneCache = new Map<string, Promise<string>>();

  constructor(private readonly logger: LoggerPort) {}

  // Without a player, feedback stays silent; findPlayer has already warned once.
  async activate(): Promise<void> {
    this.findPlayer();
  }

  async play(filePath: string): Promise<void> {
    const player = this.findPlayer();
    if (!player) return;

    await new Promise<void>((resolve, reject) => {
      const child = spawn(player.command, player.makeArgs(filePath), {
        stdio: ["ignore", "ignore", "ignore"],
      });

      let settled = false;
      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        if (err) reject(err);
        else resolve();
      };

      child.on("error", (err) => finish(err));
      child.on("exit", (code, signalName) => {
        if (code === 0) {
          finish();
        } else {
          finish(
            new Error(
              `Audio player exited with code ${code}${signalName ? ` (signal ${signalName})` : ""}`
            )
          );
        }
      });
    });
  }

  /** Concurrent calls for the same tone share one write of the file. */
  prepareTone(name: string, options: ToneOptions): Promise<string> {
    const cacheKey = `${name}:${options.frequency}:${options.ms}:${options.volume ?? ""}`;
    const cached = this.toneCache.get(cacheKey);
    if (cached) return cached;

    const fileName = `interval-timer-${cacheKey.replace(/[^a-z0-9.-]+/gi, "_")}.wav`;
    const filePath = path.join(tmpdir(), fileName);
    const pending = fs.writeFile(filePath, createToneBuffer(options)).then(
      () => filePath,
      (err: unknown) => {
        this.toneCache.delete(cacheKey);
        throw err;
      }
    );
    this.toneCache.set(cacheKey, pending);
    return pending;
  }

  private findPlayer(): AudioPlayerCandidate | null {
    if (this.detected !== undefined) return this.detected;

    for (const candidate of candidates()) {
      const probe = spawnSync("which", [candidate.command], { stdio: "ignore" });
      if (probe.status === 0) {
        this.detected = candidate;
        this.logger.debug("Audio player detected", { command: candidate.command });
        return candidate;
      }
    }

    this.logger.warn("No audio player found. Audio feedback disabled.");
    this.detected = null;
    return null;
  }
}

export function createToneBuffer({ frequency, ms, volume = 0.3 }: ToneOptions): Buffer {
  const sampleCount = Math.max(1, Math.round((SAMPLE_RATE * ms) / 1000));
  const dataSize = sampleCount * 2;
  const buffer = Buffer.alloc(44 + dataSize);

  buffer.write("RIFF", 0);
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write("WAVE", 8);
  buffer.write("fmt ", 12);
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(1, 22);
  buffer.writeUInt32LE(SAMPLE_RATE, 24);
  buffer.writeUInt32LE(SAMPLE_RATE * 2, 28);
  buffer.writeUInt16LE(2, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write("data", 36);
  buffer.writeUInt32LE(dataSize, 40);

  const amplitude = Math.max(0, Math.min(1, volume)) * 0.8 * 0x7fff;
  const fadeSamples = Math.min(sampleCount / 4, Math.round((SAMPLE_RATE * 10) / 1000));

  for (let i = 0; i < sampleCount; i++) {
    const t = i / SAMPLE_RATE;
    let sample = Math.sin(2 * Math.PI * frequency * t);
    if (fadeSamples > 0) {
      const fadeIn = Math.min(1, i / fadeSamples);
      const fadeOut = Math.min(1, (sampleCount - i - 1) / fadeSamples);
      sample *= Math.min(fadeIn, fadeOut);
    }
    buffer.writeInt16LE(Math.round(sample * amplitude), 44 + i * 2);
  }

  return buffer;
}

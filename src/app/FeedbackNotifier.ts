import { existsSync } from "fs";
import type { PhaseNotification } from "../domain/timers/Timer";
import type { AudioOutputPort, ToneOptions } from "../ports/audio/AudioOutputPort";
import type { NotificationSink } from "../ports/feedback/NotificationSink";
import type { LoggerPort } from "../ports/sys/LoggerPort";

export type FeedbackSounds = Partial<Record<PhaseNotification, string>>;

export interface FeedbackNotifierOptions {
  sounds?: FeedbackSounds;
  volume?: number;
  muted?: boolean;
}

interface NamedTone extends ToneOptions {
  name: string;
}

const BUILTIN_TONES: Record<PhaseNotification, NamedTone> = {
  "phase-end-work": { name: "work-end", frequency: 880, ms: 400 },
  "round-complete": { name: "round-complete", frequency: 660, ms: 700 },
};

const SYSTEM_TONE: NamedTone = { name: "system", frequency: 1000, ms: 200 };

/**
 * Turns phase notifications into sounds. Custom files are optional; a custom
 * file that is missing or fails to play falls back to the system tone.
 */
export class FeedbackNotifier implements NotificationSink {
  private readonly sounds: FeedbackSounds;
  private readonly volume: number;
  private readonly muted: boolean;
  private readonly reportedMissing = new Set<string>();

  constructor(
    private readonly audioOut: AudioOutputPort,
    private readonly logger: LoggerPort,
    options: FeedbackNotifierOptions = {}
  ) {
    this.sounds = options.sounds ?? {};
    this.volume = options.volume ?? 0.3;
    this.muted = options.muted ?? false;
  }

  async activate(): Promise<void> {
    if (this.muted) return;
    await this.audioOut.activate();
  }

  notify(kind: PhaseNotification): void {
    this.logger.debug("Phase notification", { kind, muted: this.muted });
    if (this.muted) return;

    this.playFor(kind).catch((err: unknown) => {
      this.logger.warn("Feedback playback failed", {
        kind,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }

  private async playFor(kind: PhaseNotification): Promise<void> {
    const custom = this.sounds[kind];
    if (!custom) {
      await this.playTone(BUILTIN_TONES[kind]);
      return;
    }

    if (!existsSync(custom)) {
      if (!this.reportedMissing.has(custom)) {
        this.reportedMissing.add(custom);
        this.logger.warn("Custom sound not found; using system sound", { file: custom });
      }
      await this.playTone(SYSTEM_TONE);
      return;
    }

    try {
      await this.audioOut.play(custom);
    } catch (err) {
      this.logger.warn("Custom sound failed; using system sound", {
        file: custom,
        error: err instanceof Error ? err.message : String(err),
      });
      await this.playTone(SYSTEM_TONE);
    }
  }

  private async playTone({ name, ...tone }: NamedTone): Promise<void> {
    const file = await this.audioOut.prepareTone(name, { ...tone, volume: this.volume });
    await this.audioOut.play(file);
  }
}

import type { NotificationSink } from "../../ports/feedback/NotificationSink";
import type { ClockPort, TickHandle } from "../../ports/sys/ClockPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import {
  DEFAULT_TIMER_SETTINGS,
  type Phase,
  type PhaseNotification,
  type TimerSettings,
  type TimerSnapshot,
} from "./Timer";
import { durationFromParts, formatClock, progressOf, toWholeSeconds } from "./duration";

const TICK_INTERVAL_MS = 1000;

type SnapshotListener = (snapshot: TimerSnapshot) => void;

/**
 * Alternating WORK/REST countdown.
 *
 * All state changes happen on the caller's event loop: either a clock tick or
 * a direct call. `anchorTime` is the wall-clock instant at which `remaining`
 * was last known to be accurate, and is only set while running.
 */
export class IntervalTimer {
  private workDuration: number;
  private restDuration: number;
  private phase: Phase = "WORK";
  private remaining: number;
  private round = 1;
  private running = false;
  private anchorTime: number | null = null;
  private ticker: TickHandle | null = null;
  private readonly listeners = new Set<SnapshotListener>();

  constructor(
    private readonly clock: ClockPort,
    private readonly sink: NotificationSink,
    private readonly logger: LoggerPort,
    settings: Partial<TimerSettings> = {}
  ) {
    this.workDuration = toWholeSeconds(settings.workDuration ?? DEFAULT_TIMER_SETTINGS.workDuration);
    this.restDuration = toWholeSeconds(settings.restDuration ?? DEFAULT_TIMER_SETTINGS.restDuration);
    this.remaining = this.workDuration;
  }

  snapshot(): TimerSnapshot {
    const duration = this.currentDuration();
    return {
      phase: this.phase,
      remaining: this.remaining,
      round: this.round,
      running: this.running,
      progressFraction: progressOf(duration, this.remaining),
      workDuration: this.workDuration,
      restDuration: this.restDuration,
      display: formatClock(this.remaining),
    };
  }

  onChange(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.anchorTime = this.clock.now();
    this.arm();
    this.logger.debug("Timer started", { phase: this.phase, remaining: this.remaining });
    this.emitChange();
    this.activateOutput();
  }

  pause(): void {
    if (!this.running) return;
    this.running = false;
    this.disarm();
    this.anchorTime = null;
    this.logger.debug("Timer paused", { phase: this.phase, remaining: this.remaining });
    this.emitChange();
  }

  reset(): void {
    const pristine =
      !this.running && this.phase === "WORK" && this.round === 1 && this.remaining === this.workDuration;

    this.running = false;
    this.disarm();
    this.anchorTime = null;
    this.phase = "WORK";
    this.remaining = this.workDuration;
    this.round = 1;

    if (!pristine) {
      this.logger.debug("Timer reset");
      this.emitChange();
    }
  }

  /** One simulated second. */
  tick(): void {
    this.advance(1);
    if (this.running) {
      this.anchorTime = this.clock.now();
    }
    this.emitChange();
  }

  /**
   * Replays every second between the anchor and `now` in one step, firing the
   * same transitions (and notifications) the missed ticks would have fired.
   */
  resynchronize(now: number): void {
    const anchor = this.anchorTime;
    if (anchor === null) return;

    const elapsed = Math.max(0, Math.floor((now - anchor) / 1000));
    const before = { phase: this.phase, round: this.round };
    this.advance(elapsed);
    this.anchorTime = now;

    this.logger.debug("Timer resynchronized", {
      elapsed,
      from: before,
      to: { phase: this.phase, round: this.round, remaining: this.remaining },
    });
    this.emitChange();
  }

  /** Tick delivery stopped. Running state and anchor are kept for the catch-up. */
  suspended(): void {
    if (!this.running) return;
    this.disarm();
    this.logger.debug("Timer suspended", { anchorTime: this.anchorTime });
  }

  resumed(now: number): void {
    if (!this.running) return;
    this.disarm();
    this.resynchronize(now);
    this.arm();
  }

  setWorkDuration(seconds: number): void {
    this.workDuration = toWholeSeconds(seconds);
    this.applyDurationEdit("WORK", this.workDuration);
  }

  setRestDuration(seconds: number): void {
    this.restDuration = toWholeSeconds(seconds);
    this.applyDurationEdit("REST", this.restDuration);
  }

  setWorkTime(minutes: number, seconds: number): void {
    this.setWorkDuration(durationFromParts(minutes, seconds));
  }

  setRestTime(minutes: number, seconds: number): void {
    this.setRestDuration(durationFromParts(minutes, seconds));
  }

  private applyDurationEdit(phase: Phase, duration: number): void {
    if (this.phase === phase) {
      this.remaining = this.running ? Math.min(this.remaining, duration) : duration;
    }
    this.emitChange();
  }

  private advance(seconds: number): void {
    let left = seconds;
    while (left > 0) {
      if (this.remaining === 0) {
        // Stuck on a zero-length phase: each second runs one transition pass.
        this.transitionPass();
        left -= 1;
        continue;
      }

      if (this.remaining > left) {
        this.remaining -= left;
        return;
      }

      left -= this.remaining;
      this.remaining = 0;
      this.transitionPass();
    }
  }

  // A zero-length phase is passed through at once, but never re-entered in the same pass.
  private transitionPass(): void {
    this.transition();
    if (this.remaining === 0) {
      this.transition();
    }
  }

  private transition(): void {
    if (this.phase === "WORK") {
      this.notify("phase-end-work");
      this.phase = "REST";
      this.remaining = this.restDuration;
    } else {
      this.notify("round-complete");
      this.phase = "WORK";
      this.remaining = this.workDuration;
      this.round += 1;
    }
  }

  private notify(kind: PhaseNotification): void {
    try {
      this.sink.notify(kind);
    } catch (err) {
      this.logger.warn("Notification sink failed", { kind, error: describeError(err) });
    }
  }

  private activateOutput(): void {
    let pending: Promise<void>;
    try {
      pending = this.sink.activate();
    } catch (err) {
      pending = Promise.reject(err);
    }
    pending.catch((err: unknown) => {
      this.logger.warn("Failed to activate audio output", { error: describeError(err) });
    });
  }

  private arm(): void {
    this.disarm();
    this.ticker = this.clock.every(TICK_INTERVAL_MS, () => this.tick());
  }

  private disarm(): void {
    this.ticker?.cancel();
    this.ticker = null;
  }

  private currentDuration(): number {
    return this.phase === "WORK" ? this.workDuration : this.restDuration;
  }

  private emitChange(): void {
    if (this.listeners.size === 0) return;
    const snapshot = this.snapshot();
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(snapshot);
      } catch (err) {
        this.logger.warn("Timer listener failed", { error: describeError(err) });
      }
    }
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

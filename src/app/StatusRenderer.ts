import type { EventBus, Subscription } from "../domain/events/EventBus";
import { Topics } from "../domain/events/EventBus";
import type { TimerSnapshot } from "../domain/timers/Timer";
import { formatClock } from "../domain/timers/duration";

const CLEAR_LINE = "\r\x1b[2K";

export interface StatusRendererOptions {
  barWidth?: number;
}

export class StatusRenderer {
  private last: TimerSnapshot | null = null;
  private subscription: Subscription | null = null;
  private readonly barWidth: number;

  constructor(
    private readonly bus: EventBus,
    private readonly out: NodeJS.WritableStream,
    options: StatusRendererOptions = {}
  ) {
    this.barWidth = options.barWidth ?? 20;
  }

  wire() {
    this.subscription?.unsubscribe();
    this.subscription = this.bus.subscribe(Topics.TimerStateChanged, (snapshot) => {
      this.render(snapshot);
    });
  }

  render(snapshot: TimerSnapshot) {
    const previous = this.last;
    this.last = snapshot;

    const moved = previous && (previous.phase !== snapshot.phase || previous.round !== snapshot.round);
    if (moved && snapshot.running) {
      this.out.write(`${CLEAR_LINE}${describeTransition(snapshot)}\n`);
    }
    this.out.write(`${CLEAR_LINE}${formatStatusLine(snapshot, this.barWidth)}`);
  }

  dispose() {
    this.subscription?.unsubscribe();
    this.subscription = null;
    if (this.last) {
      this.out.write("\n");
    }
  }
}

export function formatStatusLine(snapshot: TimerSnapshot, barWidth = 20): string {
  const filled = Math.round(snapshot.progressFraction * barWidth);
  const bar = "#".repeat(filled) + "-".repeat(barWidth - filled);
  const percent = Math.round(snapshot.progressFraction * 100);
  const paused = snapshot.running ? "" : " (paused)";
  return `Round ${snapshot.round} | ${snapshot.phase} | ${snapshot.display} [${bar}] ${percent}%${paused}`;
}

export function describeTransition(snapshot: TimerSnapshot): string {
  if (snapshot.phase === "REST") {
    return `Work done. Rest for ${formatClock(snapshot.restDuration)}.`;
  }
  return `Round ${snapshot.round}: work for ${formatClock(snapshot.workDuration)}.`;
}

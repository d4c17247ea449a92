import type { ClockPort, TickHandle } from "../../ports/sys/ClockPort";

export class NodeClock implements ClockPort {
  now(): number {
    return Date.now();
  }

  every(intervalMs: number, onTick: () => void): TickHandle {
    let active = true;
    const interval = setInterval(() => {
      if (active) onTick();
    }, intervalMs);

    return {
      cancel: () => {
        active = false;
        clearInterval(interval);
      },
    };
  }
}

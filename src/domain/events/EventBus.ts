import type { TimerSnapshot } from "../timers/Timer";
import { TimerTopics } from "../timers/TimerEvents";

export type ControlCommand = "toggle" | "reset" | "quit" | "suspend";

export interface EventMap {
  [TimerTopics.StateChanged]: TimerSnapshot;
  "control.command": ControlCommand;
}

export type EventTopic = keyof EventMap;

export interface Subscription {
  unsubscribe(): void;
}

export interface EventBus {
  publish<K extends EventTopic>(topic: K, payload: EventMap[K]): void;
  subscribe<K extends EventTopic>(topic: K, handler: (payload: EventMap[K]) => void): Subscription;
}

export const Topics = {
  TimerStateChanged: TimerTopics.StateChanged,
  CommandIssued: "control.command",
} as const satisfies Record<string, EventTopic>;

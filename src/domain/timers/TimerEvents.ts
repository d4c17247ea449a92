export const TimerTopics = {
  StateChanged: "timer.state",
} as const;

export type TimerTopic = (typeof TimerTopics)[keyof typeof TimerTopics];

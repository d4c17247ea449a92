import readline from "readline";
import type { ControlCommand, EventBus } from "../domain/events/EventBus";
import { Topics } from "../domain/events/EventBus";

export interface KeyInfo {
  name?: string;
  ctrl?: boolean;
}

export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

/** Maps single key presses onto control commands published on the bus. */
export class KeyboardControls {
  private listening = false;

  private readonly onKeypress = (str: string | undefined, key: KeyInfo | undefined) => {
    const command = commandForKey(str, key);
    if (command) {
      this.bus.publish(Topics.CommandIssued, command);
    }
  };

  constructor(
    private readonly bus: EventBus,
    private readonly input: KeyInput
  ) {}

  start() {
    if (this.listening) return;
    this.listening = true;
    readline.emitKeypressEvents(this.input);
    this.input.on("keypress", this.onKeypress);
    this.capture();
    this.input.resume();
  }

  stop() {
    if (!this.listening) return;
    this.listening = false;
    this.input.off("keypress", this.onKeypress);
    this.release();
    this.input.pause();
  }

  /** Raw mode has to be re-entered after the process was stopped and continued. */
  capture() {
    if (this.listening && this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
  }

  release() {
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
  }
}

export function commandForKey(str: string | undefined, key: KeyInfo | undefined): ControlCommand | null {
  if (key?.ctrl) {
    if (key.name === "c") return "quit";
    if (key.name === "z") return "suspend";
    return null;
  }

  switch (key?.name ?? str) {
    case "space":
    case " ":
      return "toggle";
    case "r":
      return "reset";
    case "q":
    case "escape":
      return "quit";
    default:
      return null;
  }
}

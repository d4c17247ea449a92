import { EventEmitter } from 'events';
import { PassThrough, Writable } from 'stream';
import { buildApplication } from '../../src/composition/container';
import type { AudioOutputPort } from '../../src/ports/audio/AudioOutputPort';
import type { ClockPort, TickHandle } from '../../src/ports/sys/ClockPort';
import type { LoggerPort } from '../../src/ports/sys/LoggerPort';

jest.mock('../../src/env', () => ({
  AUTOSTART: false,
  CONFIG_PATH: undefined,
  DEBUG_MODE: false,
  MUTE: false,
  WORK_TIME: '0:10',
  REST_TIME: '0:05',
}));

class ManualClock implements ClockPort {
  current = 0;
  private ticks: { onTick: () => void; cancelled: boolean }[] = [];

  now(): number {
    return this.current;
  }

  every(_intervalMs: number, onTick: () => void): TickHandle {
    const entry = { onTick, cancelled: false };
    this.ticks.push(entry);
    return { cancel: () => { entry.cancelled = true; } };
  }

  armed(): number {
    return this.ticks.filter((t) => !t.cancelled).length;
  }

  advance(seconds: number) {
    for (let i = 0; i < seconds; i++) {
      this.current += 1000;
      for (const t of this.ticks.filter((entry) => !entry.cancelled)) t.onTick();
    }
  }
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

async function makeApp() {
  const clock = new ManualClock();
  const input = Object.assign(new PassThrough(), { isTTY: true, setRawMode: jest.fn() });
  const written: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      written.push(String(chunk));
      callback();
    },
  });
  const audioOut = {
    activate: jest.fn(async () => {}),
    play: jest.fn(async () => {}),
    prepareTone: jest.fn(async (name: string) => `/tmp/${name}.wav`),
  } satisfies AudioOutputPort;
  const logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() } satisfies LoggerPort;
  const signals = Object.assign(new EventEmitter(), { pid: 777, kill: jest.fn() });

  const app = await buildApplication({ clock, input, output, audioOut, logger, signals });
  return { app, clock, input, written, audioOut, logger, signals };
}

describe('buildApplication', () => {
  test('wires keys, clock, rendering and sounds to one timer', async () => {
    const { app, clock, input, written, audioOut } = await makeApp();
    await app.start();

    expect(written[0]).toBe('\r\x1b[2KRound 1 | WORK | 00:10 [--------------------] 0% (paused)');

    input.emit('keypress', ' ', { name: 'space' });
    expect(app.timer.snapshot().running).toBe(true);
    expect(audioOut.activate).toHaveBeenCalledTimes(1);

    clock.advance(10);
    await flush();

    expect(app.timer.snapshot()).toMatchObject({ phase: 'REST', remaining: 5, round: 1 });
    expect(written).toContain('\r\x1b[2KWork done. Rest for 00:05.\n');
    expect(audioOut.prepareTone).toHaveBeenCalledWith('work-end', { frequency: 880, ms: 400, volume: 0.3 });
    expect(audioOut.play).toHaveBeenCalledWith('/tmp/work-end.wav');

    input.emit('keypress', ' ', { name: 'space' });
    expect(app.timer.snapshot().running).toBe(false);

    input.emit('keypress', 'r', { name: 'r' });
    expect(app.timer.snapshot()).toMatchObject({ phase: 'WORK', remaining: 10, round: 1 });

    await app.shutdown();
  });

  test('Ctrl+Z and fg suspend and catch up the running timer', async () => {
    const { app, clock, input, signals } = await makeApp();
    await app.start();
    input.emit('keypress', ' ', { name: 'space' });

    input.emit('keypress', undefined, { name: 'z', ctrl: true });
    expect(signals.kill).toHaveBeenCalledWith(777, 'SIGTSTP');

    signals.emit('SIGTSTP');
    expect(signals.kill).toHaveBeenLastCalledWith(777, 'SIGSTOP');
    expect(clock.armed()).toBe(0);
    expect(input.setRawMode).toHaveBeenLastCalledWith(false);

    clock.current += 37_000;
    signals.emit('SIGCONT');

    expect(app.timer.snapshot()).toMatchObject({ phase: 'WORK', remaining: 3, round: 3, running: true });
    expect(clock.armed()).toBe(1);
    expect(input.setRawMode).toHaveBeenLastCalledWith(true);

    await app.shutdown();
  });

  test('quit resolves waitForExit and shutdown releases everything', async () => {
    const { app, clock, input, signals } = await makeApp();
    await app.start();
    input.emit('keypress', ' ', { name: 'space' });

    const exited = jest.fn();
    const waiting = app.waitForExit().then(exited);
    input.emit('keypress', 'q', { name: 'q' });
    await waiting;
    expect(exited).toHaveBeenCalled();

    await app.shutdown();
    expect(app.timer.snapshot().running).toBe(false);
    expect(clock.armed()).toBe(0);
    expect(signals.listenerCount('SIGTSTP')).toBe(0);
    expect(signals.listenerCount('SIGCONT')).toBe(0);
    expect(input.listenerCount('keypress')).toBe(0);
  });
});

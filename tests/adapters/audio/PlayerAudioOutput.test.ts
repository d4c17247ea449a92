import { PlayerAudioOutput, createToneBuffer } from '../../../src/adapters/audio/PlayerAudioOutput';
import type { LoggerPort } from '../../../src/ports/sys/LoggerPort';

const mockAvailable = new Set<string>();
const mockExit = { code: 0 as number | null };

jest.mock('child_process', () => {
  const { EventEmitter } = require('events');
  return {
    spawnSync: jest.fn((cmd: string, args?: string[]) => {
      if (cmd === 'which' && Array.isArray(args)) {
        return { status: mockAvailable.has(args[0]) ? 0 : 1 };
      }
      return { status: 0 };
    }),
    spawn: jest.fn(() => {
      const proc = new EventEmitter();
      setImmediate(() => proc.emit('exit', mockExit.code, null));
      return proc;
    }),
  };
});

jest.mock('fs', () => ({ promises: { writeFile: jest.fn(async () => {}) } }));

function makeLogger(): LoggerPort {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('PlayerAudioOutput', () => {
  beforeEach(() => {
    mockAvailable.clear();
    mockAvailable.add('ffplay');
    mockExit.code = 0;
    jest.clearAllMocks();
  });

  test('activate resolves when a player exists', async () => {
    const out = new PlayerAudioOutput(makeLogger());
    await expect(out.activate()).resolves.toBeUndefined();
  });

  test('activate resolves with a single warning when no player is installed', async () => {
    mockAvailable.clear();
    const logger = makeLogger();
    const out = new PlayerAudioOutput(logger);

    await expect(out.activate()).resolves.toBeUndefined();
    await expect(out.activate()).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('No audio player found. Audio feedback disabled.');
  });

  test('play spawns the detected player and resolves on exit 0', async () => {
    const { spawn } = require('child_process');
    const out = new PlayerAudioOutput(makeLogger());

    await expect(out.play('/tmp/file.wav')).resolves.toBeUndefined();
    expect(spawn).toHaveBeenCalledWith(
      'ffplay',
      ['-autoexit', '-nodisp', '-loglevel', 'error', '/tmp/file.wav'],
      { stdio: ['ignore', 'ignore', 'ignore'] }
    );
  });

  test('play rejects when the player fails', async () => {
    mockExit.code = 1;
    const out = new PlayerAudioOutput(makeLogger());
    await expect(out.play('/tmp/file.wav')).rejects.toThrow('Audio player exited with code 1');
  });

  test('play is a no-op without a player', async () => {
    mockAvailable.clear();
    const { spawn } = require('child_process');
    const out = new PlayerAudioOutput(makeLogger());

    await out.play('/tmp/file.wav');
    expect(spawn).not.toHaveBeenCalled();
  });

  test('prepareTone caches by key and writes file once', async () => {
    const out = new PlayerAudioOutput(makeLogger());
    const path1 = await out.prepareTone('ding', { frequency: 440, ms: 100 });
    const path2 = await out.prepareTone('ding', { frequency: 440, ms: 100 });
    expect(path1).toBe(path2);
    expect(path1).toMatch(/interval-timer-ding_440_100_\.wav$/);

    const { promises } = require('fs');
    expect(promises.writeFile).toHaveBeenCalledTimes(1);
  });

  test('concurrent prepareTone calls for one tone write the file once', async () => {
    const out = new PlayerAudioOutput(makeLogger());
    const paths = await Promise.all([
      out.prepareTone('work-end', { frequency: 880, ms: 400, volume: 0.3 }),
      out.prepareTone('work-end', { frequency: 880, ms: 400, volume: 0.3 }),
      out.prepareTone('work-end', { frequency: 880, ms: 400, volume: 0.3 }),
    ]);

    expect(new Set(paths).size).toBe(1);
    const { promises } = require('fs');
    expect(promises.writeFile).toHaveBeenCalledTimes(1);
  });

  test('a failed tone write is retried on the next call', async () => {
    const { promises } = require('fs');
    promises.writeFile.mockRejectedValueOnce(new Error('disk full'));
    const out = new PlayerAudioOutput(makeLogger());

    await expect(out.prepareTone('system', { frequency: 1000, ms: 200 })).rejects.toThrow('disk full');
    await expect(out.prepareTone('system', { frequency: 1000, ms: 200 })).resolves.toMatch(
      /interval-timer-system_1000_200_\.wav$/
    );
    expect(promises.writeFile).toHaveBeenCalledTimes(2);
  });
});

describe('createToneBuffer', () => {
  test('writes a mono 16-bit WAV header sized to the tone', () => {
    const buffer = createToneBuffer({ frequency: 440, ms: 10 });
    expect(buffer.length).toBe(44 + 240 * 2);
    expect(buffer.toString('ascii', 0, 4)).toBe('RIFF');
    expect(buffer.toString('ascii', 8, 12)).toBe('WAVE');
    expect(buffer.readUInt32LE(24)).toBe(24000);
    expect(buffer.readUInt32LE(40)).toBe(480);
  });
});

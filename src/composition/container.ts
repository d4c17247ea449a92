import { loadConfig, resolveSettings } from '../config';
import { AUTOSTART, CONFIG_PATH, DEBUG_MODE, MUTE, REST_TIME, WORK_TIME } from '../env';
import { SimpleEventBus } from '../adapters/sys/SimpleEventBus';
import { NodeClock } from '../adapters/sys/NodeClock';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { PlayerAudioOutput } from '../adapters/audio/PlayerAudioOutput';
import { FeedbackNotifier } from '../app/FeedbackNotifier';
import { KeyboardControls, type KeyInput } from '../app/KeyboardControls';
import { StatusRenderer } from '../app/StatusRenderer';
import { IntervalTimer } from '../domain/timers/IntervalTimer';
import { Topics, type ControlCommand } from '../domain/events/EventBus';
import type { AudioOutputPort } from '../ports/audio/AudioOutputPort';
import type { ClockPort } from '../ports/sys/ClockPort';
import type { LoggerPort } from '../ports/sys/LoggerPort';
import { watchProcessLifecycle, type SignalHost } from '../runtime/lifecycle';

export interface ApplicationOptions {
  input?: KeyInput;
  output?: NodeJS.WritableStream;
  clock?: ClockPort;
  logger?: LoggerPort;
  audioOut?: AudioOutputPort;
  signals?: SignalHost;
}

export interface ApplicationInstance {
  readonly timer: IntervalTimer;
  start(): Promise<void>;
  /** Resolves once the user asked to quit. */
  waitForExit(): Promise<void>;
  shutdown(): Promise<void>;
}

export async function buildApplication(options: ApplicationOptions = {}): Promise<ApplicationInstance> {
  const logger = options.logger ?? new ConsoleLogger({ debug: DEBUG_MODE });

  const { config: appConfig, path: configPath } = loadConfig(CONFIG_PATH);
  if (configPath) {
    logger.info(`Loaded config from ${configPath}`);
  } else if (CONFIG_PATH) {
    logger.warn(`Config file ${CONFIG_PATH} not found; proceeding with defaults.`);
  }

  const settings = resolveSettings(appConfig, { workTime: WORK_TIME, restTime: REST_TIME });
  logger.debug('Resolved settings', { ...settings });

  const signals: SignalHost = options.signals ?? process;
  const bus = new SimpleEventBus(logger);
  const clock = options.clock ?? new NodeClock();
  const audioOut = options.audioOut ?? new PlayerAudioOutput(logger);
  const feedback = new FeedbackNotifier(audioOut, logger, {
    sounds: settings.sounds,
    volume: settings.volume,
    muted: MUTE,
  });

  const timer = new IntervalTimer(clock, feedback, logger, {
    workDuration: settings.workDuration,
    restDuration: settings.restDuration,
  });

  const renderer = new StatusRenderer(bus, options.output ?? process.stdout);
  const keyboard = new KeyboardControls(bus, options.input ?? process.stdin);

  let requestExit: () => void = () => undefined;
  const exitRequested = new Promise<void>((resolve) => {
    requestExit = resolve;
  });

  const dispatch = (command: ControlCommand) => {
    switch (command) {
      case 'toggle':
        if (timer.snapshot().running) timer.pause();
        else timer.start();
        break;
      case 'reset':
        timer.reset();
        break;
      case 'suspend':
        signals.kill(signals.pid, 'SIGTSTP');
        break;
      case 'quit':
        requestExit();
        break;
    }
  };

  const unsubscribeTimer = timer.onChange((snapshot) => {
    bus.publish(Topics.TimerStateChanged, snapshot);
  });
  const commands = bus.subscribe(Topics.CommandIssued, dispatch);
  renderer.wire();

  let unwatchLifecycle: () => void = () => undefined;

  return {
    timer,
    start: async () => {
      unwatchLifecycle = watchProcessLifecycle(
        {
          suspended: () => {
            timer.suspended();
            keyboard.release();
          },
          resumed: (now) => {
            keyboard.capture();
            timer.resumed(now);
          },
        },
        clock,
        signals
      );
      keyboard.start();
      renderer.render(timer.snapshot());
      logger.info('Space: start/pause | r: reset | q: quit | Ctrl+Z: suspend');
      if (AUTOSTART) {
        timer.start();
      }
    },
    waitForExit: () => exitRequested,
    shutdown: async () => {
      timer.pause();
      unwatchLifecycle();
      keyboard.stop();
      commands.unsubscribe();
      unsubscribeTimer();
      renderer.dispose();
    },
  };
}

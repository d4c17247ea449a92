import { config } from 'dotenv';

config();

export let DEBUG_MODE = process.env.DEBUG_MODE === 'true';
export let MUTE = process.env.MUTE === 'true';
export let AUTOSTART = process.env.AUTOSTART === 'true';

let workTimeArg = process.env.WORK_TIME;
let restTimeArg = process.env.REST_TIME;
let configPathArg: string | undefined;
let logFileArg: string | undefined;

const cliArgs = process.argv.slice(2);

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  switch (arg) {
    case '--config':
      if (cliArgs[i + 1]) {
        configPathArg = cliArgs[++i];
      }
      break;
    case '--log-file':
      if (cliArgs[i + 1]) {
        logFileArg = cliArgs[++i];
      }
      break;
    case '--work':
      if (cliArgs[i + 1]) {
        workTimeArg = cliArgs[++i];
      }
      break;
    case '--rest':
      if (cliArgs[i + 1]) {
        restTimeArg = cliArgs[++i];
      }
      break;
    case '--debug':
      DEBUG_MODE = true;
      break;
    case '--no-debug':
      DEBUG_MODE = false;
      break;
    case '--mute':
      MUTE = true;
      break;
    case '--no-mute':
      MUTE = false;
      break;
    case '--autostart':
      AUTOSTART = true;
      break;
    default:
      break;
  }
}

export const CONFIG_PATH = configPathArg;
export const LOG_FILE = logFileArg;
export const WORK_TIME = workTimeArg;
export const REST_TIME = restTimeArg;

import os from 'os';
import path from 'path';
import { parseLogLevel, type LogThreshold } from '../utils/logger.js';

export type GraphicsProtocol = 'kitty' | 'iterm';

export interface Settings {
  configPath: string;
  logLevel: LogThreshold;
  logFile: string;
  fetchTimeoutMs: number;
  historyPeriodDays: number;
  graphicsProtocol: GraphicsProtocol;
}

function getEnv(env: NodeJS.ProcessEnv, key: string, def: string) {
  const v = env[key];
  return (v === undefined || v === null || v === '') ? def : v;
}

function getNumber(env: NodeJS.ProcessEnv, key: string, def: number) {
  const n = Number(getEnv(env, key, String(def)));
  return Number.isFinite(n) && n > 0 ? n : def;
}

/**
 * iTerm2 when the terminal says so or GRAPHICS_PROTOCOL=iterm, kitty otherwise.
 */
export function detectGraphicsProtocol(env: NodeJS.ProcessEnv = process.env): GraphicsProtocol {
  let termProgram = env.TERM_PROGRAM || '';
  if ((env.TERM || '').toLowerCase().includes('kitty')) termProgram = 'kitty';
  const forced = (env.GRAPHICS_PROTOCOL || '').toLowerCase();
  if (termProgram.includes('iTerm') || forced === 'iterm') return 'iterm';
  return 'kitty';
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    configPath: path.resolve(getEnv(env, 'STOCK_TERMINAL_CONFIG', path.join(os.homedir(), '.stock-terminal.json'))),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFile: path.resolve(getEnv(env, 'LOG_FILE', 'stock-terminal.log')),
    fetchTimeoutMs: getNumber(env, 'FETCH_TIMEOUT_MS', 10000),
    historyPeriodDays: getNumber(env, 'HISTORY_PERIOD_DAYS', 183),
    graphicsProtocol: detectGraphicsProtocol(env),
  };
}

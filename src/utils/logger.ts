import fs from 'fs';

type Fields = Record<string, unknown>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

/** Receives one serialised JSON line per log call. */
export type LogSink = (level: LogLevel, line: string) => void;

const RANK: Record<LogThreshold, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };
const LEVELS: LogThreshold[] = ['debug', 'info', 'warn', 'error', 'silent'];

function toErrorPayload(err: unknown) {
  if (!err) return undefined;
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  if (typeof err === 'object') return err;
  return { message: String(err) };
}

export function parseLogLevel(value: string | undefined, def: LogThreshold = 'info'): LogThreshold {
  const v = String(value || '').trim().toLowerCase();
  const match = LEVELS.find(l => l === v);
  return match ?? def;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(line + '\n');
};

export function fileSink(file: string): LogSink {
  return (_level, line) => {
    try { fs.appendFileSync(file, line + '\n', 'utf8'); } catch (err) {
      process.stderr.write(`log_file_write_failed ${file}: ${err instanceof Error ? err.message : String(err)}\n`);
    }
  };
}

let threshold: LogThreshold = parseLogLevel(process.env.LOG_LEVEL);
let sink: LogSink = consoleSink;

export function configureLogger(opts: { level?: LogThreshold; sink?: LogSink }) {
  if (opts.level) threshold = opts.level;
  if (opts.sink) sink = opts.sink;
}

function emit(level: LogLevel, msg?: string, fields?: Fields) {
  if (RANK[level] < RANK[threshold]) return;
  const payload: Fields = {
    level,
    time: new Date().toISOString(),
    ...(fields || {}),
    msg: msg || fields?.msg || '',
  };
  // Normalize embedded error if present
  if (fields?.err) {
    payload.err = toErrorPayload(fields.err);
  }
  sink(level, JSON.stringify(payload));
}

function dispatch(level: LogLevel, arg1?: string | Fields, arg2?: string) {
  if (typeof arg1 === 'string') return emit(level, arg1);
  emit(level, arg2, arg1 || {});
}

export const logger = {
  info(arg1?: string | Fields, arg2?: string) { dispatch('info', arg1, arg2); },
  warn(arg1?: string | Fields, arg2?: string) { dispatch('warn', arg1, arg2); },
  error(arg1?: string | (Fields & { err?: unknown }), arg2?: string) { dispatch('error', arg1, arg2); },
  debug(arg1?: string | Fields, arg2?: string) { dispatch('debug', arg1, arg2); }
};

export type { Fields };

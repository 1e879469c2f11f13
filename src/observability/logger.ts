import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const silenced = process.env.NODE_ENV === 'test';
const consoleEnabled = silenced ? false : process.env.LOG_CONSOLE !== '0';
const fileEnabled = silenced ? false : process.env.LOG_TO_FILE !== '0';
const logFile = process.env.LOG_FILE ?? 'logs/tool-calling.log';
let fileReady = false;

const rank: Record<Level, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

function resolveThreshold(): number {
  const wanted = (process.env.LOG_LEVEL ?? 'info').toUpperCase();
  switch (wanted) {
    case 'DEBUG':
    case 'INFO':
    case 'WARN':
    case 'ERROR':
      return rank[wanted];
    default:
      return rank.INFO;
  }
}

const threshold = resolveThreshold();

function pad(num: number, size = 2) {
  return num.toString().padStart(size, '0');
}

function localTs() {
  const d = new Date();
  const date = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
  return `${date} ${time}`;
}

function color(level: Level) {
  const reset = '\x1b[0m';
  const colors: Record<Level, string> = {
    INFO: '\x1b[34m', // blue
    DEBUG: '\x1b[95m', // bright magenta
    WARN: '\x1b[33m', // yellow
    ERROR: '\x1b[31m' // red
  };
  return `${colors[level]}[${level}]${reset}`;
}

function stringify(v: unknown): string {
  if (typeof v === 'string') return v;
  if (v instanceof Error) return v.stack ?? `${v.name}: ${v.message}`;
  try {
    return JSON.stringify(v);
  } catch {
    return String(v);
  }
}

function writeFileLog(level: Level, args: unknown[]) {
  if (!fileEnabled) return;
  if (!fileReady) {
    mkdirSync(dirname(logFile), { recursive: true });
    fileReady = true;
  }
  appendFileSync(logFile, `[${localTs()}] [${level}] ${args.map(stringify).join(' ')}\n`, 'utf8');
}

function emit(level: Level, args: unknown[]) {
  if (rank[level] < threshold) return;
  if (consoleEnabled) {
    const line = [`[${localTs()}] ${color(level)}`, ...args];
    if (level === 'ERROR') console.error(...line);
    else if (level === 'WARN') console.warn(...line);
    else console.log(...line);
  }
  writeFileLog(level, args);
}

export const logger = {
  info: (...args: unknown[]) => emit('INFO', args),
  warn: (...args: unknown[]) => emit('WARN', args),
  error: (...args: unknown[]) => emit('ERROR', args),
  debug: (...args: unknown[]) => emit('DEBUG', args)
};

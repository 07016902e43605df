import { getConfig } from '../config/env';

const COLORS = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  blue: '\x1b[34m',
};

type Level = 'debug' | 'info' | 'warn' | 'error';

const RANK: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function enabled(level: Level): boolean {
  return RANK[level] >= RANK[getConfig().LOG_LEVEL];
}

function ts(): string {
  return new Date().toISOString();
}

// JSON.stringify that renders bigint amounts as decimal strings.
export function stringifyWithBigInt(value: unknown, space?: number): string {
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v), space);
}

function line(level: Level, prefix: string, message: string) {
  if (!enabled(level)) return;
  // eslint-disable-next-line no-console
  console.log(`${COLORS.gray}[${ts()}]${COLORS.reset} ${prefix} ${message}`);
}

export const logger = {
  debug(message: string) {
    line('debug', `${COLORS.blue}DEBUG${COLORS.reset}`, message);
  },
  info(message: string) {
    line('info', `${COLORS.cyan}INFO${COLORS.reset}`, message);
  },
  warn(message: string) {
    line('warn', `${COLORS.yellow}WARN${COLORS.reset}`, message);
  },
  error(message: string) {
    line('error', `${COLORS.red}ERROR${COLORS.reset}`, message);
  },
  section(title: string) {
    if (!enabled('info')) return;
    const bar = `${COLORS.magenta}==============================${COLORS.reset}`;
    // eslint-disable-next-line no-console
    console.log(`${bar}\n${COLORS.magenta}${title}${COLORS.reset}\n${bar}`);
  },
  json(title: string, obj: unknown) {
    this.info(`${title}:\n${COLORS.gray}${stringifyWithBigInt(obj, 2)}${COLORS.reset}`);
  },
};

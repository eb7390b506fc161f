import { errorMessage } from "../error/errors.js";

// ANSI color codes for terminal styling
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bright: '\x1b[1m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
} as const;

export type ColorName = Exclude<keyof typeof colors, "reset">;

export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR", "CRITICAL"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
};

export interface ApiCallEvent {
  provider: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  cost: number;
}

export interface ErrorEvent {
  errorType: string;
  message: string;
  context?: string;
}

/** What the chat core needs from a logger. Formatting is the sink's business. */
export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  apiCall(event: ApiCallEvent): void;
  failure(event: ErrorEvent): void;
}

export interface ConsoleLogger extends Logger {
  readonly level: LogLevel;
  success(...args: unknown[]): void;
  step(step: string, ...args: unknown[]): void;
  raw(...args: unknown[]): void;
  colors: Record<ColorName, (text: string) => string>;
}

export interface LoggerOptions {
  level?: LogLevel;
  // Defaults to on for a TTY without NO_COLOR
  color?: boolean;
}

export function errorEvent(error: unknown, context?: string): ErrorEvent {
  return {
    errorType: error instanceof Error ? error.name : typeof error,
    message: errorMessage(error),
    context,
  };
}

function formatTimestamp(): string {
  return new Date().toISOString().slice(11, 19); // HH:MM:SS format
}

function join(args: unknown[]): string {
  return args.map((a) => (a instanceof Error ? a.message : String(a))).join(' ');
}

export function createLogger(opts: LoggerOptions = {}): ConsoleLogger {
  const level = opts.level ?? "INFO";
  const useColor = opts.color ?? (!process.env.NO_COLOR && Boolean(process.stdout.isTTY));

  const colorize = (text: string, color: ColorName): string =>
    useColor ? `${colors[color]}${text}${colors.reset}` : text;
  const enabled = (at: LogLevel): boolean => LEVEL_RANK[at] >= LEVEL_RANK[level];
  const line = (prefix: string, args: unknown[]): string =>
    `${colorize(formatTimestamp(), 'dim')} ${prefix} ${join(args)}`;

  const logger: ConsoleLogger = {
    level,

    debug: (...args) => {
      if (!enabled("DEBUG")) return;
      console.log(line(colorize('debug', 'magenta'), args));
    },

    info: (...args) => {
      if (!enabled("INFO")) return;
      console.log(line(colorize('info', 'cyan'), args));
    },

    // Success/completion messages
    success: (...args) => {
      if (!enabled("INFO")) return;
      console.log(line(colorize('✓', 'green'), args));
    },

    warn: (...args) => {
      if (!enabled("WARNING")) return;
      console.warn(line(colorize('warn', 'yellow'), args));
    },

    error: (...args) => {
      if (!enabled("ERROR")) return;
      console.error(line(colorize('error', 'red'), args));
    },

    step: (step, ...args) => {
      if (!enabled("INFO")) return;
      const stepText = colorize(step, 'bright');
      console.log(`${colorize(formatTimestamp(), 'dim')} ${colorize('→', 'blue')} ${stepText}${args.length > 0 ? ': ' + join(args) : ''}`);
    },

    // Raw output without formatting, never filtered
    raw: (...args) => {
      console.log(...args);
    },

    apiCall: (event) => {
      logger.info(
        `API Call | Provider: ${event.provider} | Model: ${event.model} | ` +
          `Tokens: ${event.inputTokens}→${event.outputTokens} | Cost: $${event.cost.toFixed(6)}`
      );
    },

    failure: (event) => {
      logger.error(event.context ? `${event.context}: ${event.errorType} - ${event.message}` : event.message);
    },

    colors: {
      dim: (text) => colorize(text, 'dim'),
      bright: (text) => colorize(text, 'bright'),
      red: (text) => colorize(text, 'red'),
      green: (text) => colorize(text, 'green'),
      yellow: (text) => colorize(text, 'yellow'),
      blue: (text) => colorize(text, 'blue'),
      magenta: (text) => colorize(text, 'magenta'),
      cyan: (text) => colorize(text, 'cyan'),
      white: (text) => colorize(text, 'white'),
    },
  };

  return logger;
}

// src/util/logger.ts

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

/**
 * Where formatted lines go. Defaults to the console; tests pass their own.
 */
export interface LogSink {
   error(line: string, ...rest: unknown[]): void;
   warn(line: string, ...rest: unknown[]): void;
   info(line: string, ...rest: unknown[]): void;
   debug(line: string, ...rest: unknown[]): void;
}

export interface LoggerOptions {
   level?: LogLevel;
   /**
    * Optional prefix string (e.g. "[brine]" or "[cli]").
    */
   prefix?: string;
   sink?: LogSink;
   /** Force colors on or off; defaults to TTY detection. */
   color?: boolean;
}

const consoleSink: LogSink = {
   error: (line, ...rest) => console.error(line, ...rest),
   warn: (line, ...rest) => console.warn(line, ...rest),
   info: (line, ...rest) => console.log(line, ...rest),
   debug: (line, ...rest) => console.debug(line, ...rest),
};

const supportsColor =
   typeof process !== 'undefined' &&
   !!process.stdout &&
   !!process.stdout.isTTY &&
   process.env.NO_COLOR === undefined;

type ColorFn = (text: string) => string;

function ansi(code: number): ColorFn {
   return (text: string) => `\u001b[${code}m${text}\u001b[0m`;
}

const palette = {
   red: ansi(31),
   yellow: ansi(33),
   cyan: ansi(36),
   magenta: ansi(35),
   dim: ansi(2),
};

function colorForLevel(level: LogLevel): ColorFn {
   switch (level) {
      case 'error':
         return palette.red;
      case 'warn':
         return palette.yellow;
      case 'info':
         return palette.cyan;
      case 'debug':
         return palette.dim;
      default:
         return (s) => s;
   }
}

export function isLogLevel(value: unknown): value is LogLevel {
   const levels: readonly string[] = LEVEL_ORDER;
   return typeof value === 'string' && levels.includes(value);
}

/**
 * Leveled logger with optional ANSI colors and composable prefixes.
 */
export class Logger {
   /** Unset on a child until its own setLevel(); it then reads the parent's. */
   private level: LogLevel | undefined;
   private readonly prefix: string | undefined;
   private readonly sink: LogSink;
   private readonly color: boolean;

   constructor(
      options: LoggerOptions = {},
      private readonly parent?: Logger,
   ) {
      this.level = options.level ?? (parent ? undefined : 'info');
      this.prefix = options.prefix;
      this.sink = options.sink ?? consoleSink;
      this.color = options.color ?? supportsColor;
   }

   setLevel(level: LogLevel) {
      this.level = level;
   }

   getLevel(): LogLevel {
      return this.level ?? this.parent?.getLevel() ?? 'info';
   }

   /**
    * Create a child logger with an additional prefix. The child holds no
    * reference from the parent, so short-lived children are collected.
    */
   child(prefix: string): Logger {
      return new Logger(
         {
            prefix: this.prefix ? `${this.prefix}${prefix}` : prefix,
            sink: this.sink,
            color: this.color,
         },
         this,
      );
   }

   private format(msg: unknown, lvl: LogLevel): string {
      const text = typeof msg === 'string' ? msg : msg instanceof Error ? msg.message : String(msg);
      if (!this.color) {
         return this.prefix ? `${this.prefix} ${text}` : text;
      }

      const body = colorForLevel(lvl)(text);
      return this.prefix ? `${palette.magenta(this.prefix)} ${body}` : body;
   }

   private shouldLog(target: LogLevel): boolean {
      const level = this.getLevel();
      if (level === 'silent') return false;
      return LEVEL_ORDER.indexOf(target) <= LEVEL_ORDER.indexOf(level);
   }

   error(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('error')) return;
      this.sink.error(this.format(msg, 'error'), ...rest);
   }

   warn(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('warn')) return;
      this.sink.warn(this.format(msg, 'warn'), ...rest);
   }

   info(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('info')) return;
      this.sink.info(this.format(msg, 'info'), ...rest);
   }

   debug(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('debug')) return;
      this.sink.debug(this.format(msg, 'debug'), ...rest);
   }
}

const envLevel = process.env.BRINE_LOG_LEVEL;

/**
 * Default process-wide logger used by CLI and core.
 * Level can be controlled via BRINE_LOG_LEVEL env.
 */
export const defaultLogger = new Logger({
   level: isLogLevel(envLevel) ? envLevel : 'info',
   prefix: '[brine]',
});

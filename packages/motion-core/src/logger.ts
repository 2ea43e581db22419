// ---------------------------------------------------------------------------
// Structured logging
// ---------------------------------------------------------------------------
//
// One JSON line per event: { ts, level, event, ...fields }. Written to stdout
// by default so any aggregator that reads JSON lines can consume it.

import { resolveSettings, LOG_LEVELS, type LogLevel } from '@axis-sim/config';

export type LogFields = Record<string, unknown>;

export interface Logger {
  readonly level: LogLevel;
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  /** Minimum level emitted. Defaults to AXIS_SIM_LOG_LEVEL. */
  level?: LogLevel;
  /** Receives each serialised line (with trailing newline). */
  sink?: (line: string) => void;
  /** Clock for the `ts` field. */
  now?: () => Date;
}

type EmitLevel = Exclude<LogLevel, 'silent'>;

function stdoutSink(line: string): void {
  process.stdout.write(line);
}

/** Create a JSON-lines logger. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveSettings().LOG_LEVEL;
  const sink = options.sink ?? stdoutSink;
  const now = options.now ?? (() => new Date());
  const threshold = LOG_LEVELS.indexOf(level);

  const emit = (lvl: EmitLevel, event: string, fields?: LogFields): void => {
    if (LOG_LEVELS.indexOf(lvl) < threshold) return;
    const entry = { ts: now().toISOString(), level: lvl, event, ...fields };
    sink(JSON.stringify(entry) + '\n');
  };

  return {
    level,
    debug: (event, fields) => emit('debug', event, fields),
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: 'silent', sink: () => {} });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  changeId: string;
  repoRoot?: string;
}

interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  changeId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  repoRoot?: string;
}

type LogMethod = (phase: string, message: string, data?: Record<string, unknown>) => void;

export interface ChangeLogger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_RANK;
}

class Logger {
  private context: LogContext | null = null;
  private threshold: LogLevel = 'info';

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  setLevel(level: LogLevel): void {
    this.threshold = level;
  }

  getLevel(): LogLevel {
    return this.threshold;
  }

  private log(
    level: Exclude<LogLevel, 'silent'>,
    phase: string,
    message: string,
    data?: Record<string, unknown>,
    changeId?: string
  ): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.threshold]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      changeId: changeId || this.context?.changeId || 'unknown',
      phase,
      message,
      data,
    };

    if (this.context?.repoRoot) entry.repoRoot = this.context.repoRoot;

    // stdout belongs to command output
    process.stderr.write(JSON.stringify(entry) + '\n');
  }

  /**
   * Logger bound to one change. Sessions served side by side log through
   * their own instance instead of the process-wide context.
   */
  forChange(changeId: string): ChangeLogger {
    return {
      debug: (phase, message, data) => this.log('debug', phase, message, data, changeId),
      info: (phase, message, data) => this.log('info', phase, message, data, changeId),
      warn: (phase, message, data) => this.log('warn', phase, message, data, changeId),
      error: (phase, message, data) => this.log('error', phase, message, data, changeId),
    };
  }

  debug(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', phase, message, data);
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

export const logger = new Logger();

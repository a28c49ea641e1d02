/**
 * Logger Module
 *
 * Structured logging with configurable verbosity. Every subsystem of the
 * analyzer logs through a named module logger; recoverable conditions found
 * while replaying a program are reported through `warn`.
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogStream = 'stdout' | 'stderr';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  timestamps: boolean;
  colors: boolean;
  /** Where debug and info lines go. Warnings and errors always use stderr. */
  stream: LogStream;
  module?: string;
}

// =============================================================================
// Constants
// =============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

// =============================================================================
// Default Configuration
// =============================================================================

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  timestamps: false,
  colors: true,
  stream: 'stdout',
};

// Global configuration
let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private overrides: Partial<LoggerConfig>;
  private module: string;

  constructor(module: string, config: Partial<LoggerConfig> = {}) {
    this.module = module;
    this.overrides = { ...config };
  }

  // Loggers created at import time must still follow later configureLogger calls
  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides, module: this.module };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  private formatTimestamp(): string {
    if (!this.config.timestamps) return '';
    const now = new Date().toISOString();
    if (this.config.colors) {
      return `${COLORS.dim}[${now}]${COLORS.reset}`;
    }
    return `[${now}]`;
  }

  private formatLevel(level: LogLevel): string {
    const labels: Record<LogLevel, string> = {
      debug: 'DBG',
      info: 'INF',
      warn: 'WRN',
      error: 'ERR',
      silent: '',
    };

    if (!this.config.colors) {
      return `[${labels[level]}]`;
    }

    const colors: Record<LogLevel, string> = {
      debug: COLORS.gray,
      info: COLORS.blue,
      warn: COLORS.yellow,
      error: COLORS.red,
      silent: '',
    };

    return `${colors[level]}[${labels[level]}]${COLORS.reset}`;
  }

  private formatModule(): string {
    if (this.config.colors) {
      return `${COLORS.cyan}[${this.module}]${COLORS.reset}`;
    }
    return `[${this.module}]`;
  }

  formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const parts = [
      this.formatTimestamp(),
      this.formatLevel(level),
      this.formatModule(),
      message,
    ].filter(Boolean);

    let output = parts.join(' ');

    if (data !== undefined) {
      if (typeof data === 'object') {
        output += '\n' + JSON.stringify(data, null, 2);
      } else {
        output += ` ${data}`;
      }
    }

    return output;
  }

  private emit(level: LogLevel, message: string, data?: unknown): void {
    const line = this.formatMessage(level, message, data);
    if (level === 'warn') {
      console.warn(line);
    } else if (level === 'error' || this.config.stream === 'stderr') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string, data?: unknown): void {
    if (this.shouldLog('debug')) {
      this.emit('debug', message, data);
    }
  }

  info(message: string, data?: unknown): void {
    if (this.shouldLog('info')) {
      this.emit('info', message, data);
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.shouldLog('warn')) {
      this.emit('warn', message, data);
    }
  }

  error(message: string, data?: unknown): void {
    if (this.shouldLog('error')) {
      this.emit('error', message, data);
    }
  }

  /**
   * Create a child logger with a sub-module name
   */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.overrides);
  }

  getName(): string {
    return this.module;
  }

  /**
   * Get current log level
   */
  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * Set log level for this logger instance
   */
  setLevel(level: LogLevel): void {
    this.overrides.level = level;
  }
}

// =============================================================================
// Global Functions
// =============================================================================

/**
 * Configure global logger settings
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Get current global configuration
 */
export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

export function setLogLevel(level: LogLevel): void {
  globalConfig.level = level;
}

export function getLogLevel(): LogLevel {
  return globalConfig.level;
}

/**
 * Create a new logger for a module
 */
export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger(module, config);
}

/**
 * Parse log level from string (for CLI)
 */
export function parseLogLevel(value: string): LogLevel | null {
  const normalized = value.toLowerCase();
  for (const level of getAvailableLevels()) {
    if (level === normalized) return level;
  }
  return null;
}

export function getAvailableLevels(): LogLevel[] {
  return ['debug', 'info', 'warn', 'error', 'silent'];
}

// =============================================================================
// Pre-configured Loggers
// =============================================================================

export const loggers = {
  tarlan: createLogger('tarlan'),
  tcl: createLogger('tcl'),
  eros: createLogger('eros'),
  nco: createLogger('nco'),
  experiment: createLogger('experiment'),
  cli: createLogger('cli'),
  mcp: createLogger('mcp'),
};

export default Logger;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(name: string): Logger;
  withModel(modelId: string): Logger;
}

export interface LoggerConfig {
  level: LogLevel;
  name?: string;
  modelId?: string;
}

export interface LogOutput {
  write(entry: LogEntry): void;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  name?: string;
  modelId?: string;
  context?: Record<string, unknown>;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class ConsoleLogOutput implements LogOutput {
  write(entry: LogEntry): void {
    const prefix = entry.name ? `[${entry.name}]` : '';
    const modelPrefix = entry.modelId ? `[model:${entry.modelId}]` : '';
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    const timePart = entry.timestamp.split('T')[1] || '';
    const timestamp = timePart.split('.')[0] || '';

    const message = `${timestamp} ${entry.level.toUpperCase().padEnd(5)} ${prefix}${modelPrefix} ${entry.message}${contextStr}`;

    switch (entry.level) {
      case 'debug':
        console.debug(message);
        break;
      case 'info':
        console.info(message);
        break;
      case 'warn':
        console.warn(message);
        break;
      case 'error':
        console.error(message);
        break;
    }
  }
}

export class DefaultLogger implements Logger {
  private readonly level: LogLevel;
  private readonly name?: string;
  private readonly modelId?: string;
  private readonly output: LogOutput;

  constructor(config: LoggerConfig, output?: LogOutput) {
    this.level = config.level;
    this.name = config.name;
    this.modelId = config.modelId;
    this.output = output || new ConsoleLogOutput();
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  child(name: string): Logger {
    const childName = this.name ? `${this.name}:${name}` : name;
    return new DefaultLogger(
      { level: this.level, name: childName, modelId: this.modelId },
      this.output
    );
  }

  withModel(modelId: string): Logger {
    return new DefaultLogger(
      { level: this.level, name: this.name, modelId },
      this.output
    );
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    this.output.write({
      level,
      message,
      timestamp: new Date().toISOString(),
      name: this.name,
      modelId: this.modelId,
      context,
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }
}

let globalLogger: Logger | null = null;

export function initializeLogger(config: LoggerConfig, output?: LogOutput): Logger {
  globalLogger = new DefaultLogger(config, output);
  return globalLogger;
}

export function getLogger(name?: string): Logger {
  if (!globalLogger) {
    globalLogger = new DefaultLogger({ level: 'info' });
  }

  return name ? globalLogger.child(name) : globalLogger;
}

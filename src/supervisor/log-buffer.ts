import { formatClockTime, truncateToSeconds } from '../utils/timestamp';

export const LOG_BUFFER_CAPACITY = 200;

export interface LogLine {
  readonly timestamp: Date;
  readonly text: string;
}

/**
 * Bounded, insertion-ordered buffer of managed-process output.
 * Once full, each append evicts the oldest line.
 */
export class LogBuffer {
  private lines: LogLine[] = [];
  readonly capacity: number;

  constructor(capacity: number = LOG_BUFFER_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Log buffer capacity must be a positive integer, got ${capacity}`);
    }

    this.capacity = capacity;
  }

  get size(): number {
    return this.lines.length;
  }

  append(text: string, at: Date = new Date()): LogLine {
    const line: LogLine = Object.freeze({ timestamp: truncateToSeconds(at), text });

    this.lines.push(line);

    if (this.lines.length > this.capacity) {
      this.lines.shift();
    }

    return line;
  }

  /**
   * The last `count` lines in original order, or every line when fewer exist.
   */
  get(count: number): LogLine[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Line count must be a non-negative integer, got ${count}`);
    }

    if (count === 0) {
      return [];
    }

    return this.lines.slice(-count);
  }

  getAll(): LogLine[] {
    return [...this.lines];
  }

  clear(): void {
    this.lines = [];
  }
}

export function formatLogLine(line: LogLine): string {
  return `[${formatClockTime(line.timestamp)}] ${line.text}`;
}

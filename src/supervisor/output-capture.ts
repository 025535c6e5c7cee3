import { createInterface, Interface } from 'readline';
import { Readable } from 'stream';
import { getLogger, Logger } from '../utils/logger';

export type LineHandler = (line: string) => void;

/**
 * Reads a managed process's output streams line by line until they end.
 * One capture exists per managed process; the supervisor joins it on release.
 */
export class OutputCapture {
  readonly done: Promise<void>;
  private readonly streams: Readable[];
  private readonly readers: Interface[] = [];
  private readonly logger: Logger;

  constructor(streams: ReadonlyArray<Readable | null>, onLine: LineHandler, logger?: Logger) {
    this.logger = logger || getLogger('output-capture');
    this.streams = streams.filter((stream): stream is Readable => stream !== null);
    this.done = Promise.all(this.streams.map((stream) => this.read(stream, onLine))).then(
      () => undefined
    );
  }

  /**
   * Give the readers up to `graceMs` to reach end-of-input, then cancel.
   */
  async finish(graceMs: number): Promise<void> {
    let timeoutId: NodeJS.Timeout | undefined;

    const drained = await Promise.race([
      this.done.then(() => true),
      new Promise<boolean>((resolve) => {
        timeoutId = setTimeout(() => resolve(false), graceMs);
      }),
    ]);

    if (timeoutId) {
      clearTimeout(timeoutId);
    }

    if (!drained) {
      this.logger.debug('Output did not drain in time, cancelling capture', { graceMs });
      await this.cancel();
    }
  }

  async cancel(): Promise<void> {
    for (const reader of this.readers) {
      reader.close();
    }

    for (const stream of this.streams) {
      stream.destroy();
    }

    await this.done;
  }

  private read(stream: Readable, onLine: LineHandler): Promise<void> {
    // Invalid UTF-8 sequences decode to U+FFFD instead of failing the line
    stream.setEncoding('utf8');

    const reader = createInterface({ input: stream, crlfDelay: Infinity });
    this.readers.push(reader);

    reader.on('line', (raw: string) => {
      const text = raw.trim();

      if (text) {
        onLine(text);
      }
    });

    stream.on('error', (error: Error) => {
      this.logger.warn('Output stream error', { error: error.message });
      reader.close();
    });
    // readline re-emits input errors here; the stream listener has logged it
    reader.on('error', () => reader.close());

    return new Promise((resolve) => {
      reader.once('close', () => resolve());
    });
  }
}

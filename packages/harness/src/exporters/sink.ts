/**
 * Output sinks for exporters
 *
 * A sink either borrows a stream it must leave open, or owns a file it must close.
 */

import * as fs from 'node:fs';
import { SinkError } from '../errors.js';

export interface Sink {
  write(chunk: string): void;
  close(): void;
  /**
   * Resolves once everything written so far has reached the target.
   * Rejects with a SinkError when it could not be delivered.
   */
  flush(): Promise<void>;
  readonly closed: boolean;
}

/**
 * Writes to a borrowed stream such as process.stdout. Closing does not end the stream.
 *
 * Stream failures arrive asynchronously as 'error' events; the first one is kept and
 * raised from the next write(), close() or flush().
 */
export class StreamSink implements Sink {
  private readonly stream: NodeJS.WritableStream;
  private isClosed = false;
  private failure: Error | null = null;
  private readonly onError = (error: Error): void => {
    if (!this.failure) this.failure = error;
  };

  constructor(stream: NodeJS.WritableStream) {
    this.stream = stream;
    this.stream.on('error', this.onError);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  write(chunk: string): void {
    if (this.isClosed) {
      throw new SinkError('Cannot write to a closed stream sink');
    }
    this.throwIfFailed();
    this.stream.write(chunk, (error) => {
      if (error) this.onError(error);
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.throwIfFailed();
  }

  flush(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.failure) {
        reject(this.streamError(this.failure));
        return;
      }
      // Callbacks run in write order, so this one fires after every earlier chunk
      this.stream.write('', (error) => {
        const failure = this.failure ?? error;
        if (failure) {
          // The listener stays attached: a failed stream may still emit 'error'
          reject(this.streamError(failure));
          return;
        }
        this.stream.off('error', this.onError);
        resolve();
      });
    });
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw this.streamError(this.failure);
    }
  }

  private streamError(cause: Error): SinkError {
    return new SinkError('Cannot write output stream', null, cause);
  }
}

/**
 * Owns a file opened (created or truncated) on construction
 */
export class FileSink implements Sink {
  readonly path: string;
  private fd: number | null;

  constructor(path: string) {
    this.path = path;
    try {
      this.fd = fs.openSync(path, 'w');
    } catch (error) {
      throw new SinkError('Cannot open output file', path, error);
    }
  }

  get closed(): boolean {
    return this.fd === null;
  }

  write(chunk: string): void {
    if (this.fd === null) {
      throw new SinkError('Cannot write to a closed file sink', this.path);
    }
    try {
      fs.writeSync(this.fd, chunk);
    } catch (error) {
      throw new SinkError('Cannot write output file', this.path, error);
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      fs.closeSync(fd);
    } catch (error) {
      throw new SinkError('Cannot close output file', this.path, error);
    }
  }

  async flush(): Promise<void> {
    // Writes are synchronous
  }
}

/**
 * Collects output in memory
 */
export class MemorySink implements Sink {
  private readonly chunks: string[] = [];
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  write(chunk: string): void {
    if (this.isClosed) {
      throw new SinkError('Cannot write to a closed memory sink');
    }
    this.chunks.push(chunk);
  }

  close(): void {
    this.isClosed = true;
  }

  async flush(): Promise<void> {}

  contents(): string {
    return this.chunks.join('');
  }
}

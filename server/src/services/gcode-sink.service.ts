import * as fs from 'fs';
import { OutputWriteError } from '../errors/conversion.errors';

/**
 * Destination for emitted G-code text. Opened once, written sequentially,
 * closed once.
 */
export interface GcodeSink {
  /** Output identifier; its base name is what the printer displays */
  readonly name: string;
  readonly bytesWritten: number;
  readonly isOpen: boolean;
  open(): void;
  write(text: string): void;
  flush(): void;
  close(): void;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Writes to a file through a synchronous descriptor. Text is buffered and
 * pushed to disk on `flush()` and on `close()`.
 */
export class FileSink implements GcodeSink {
  private fd: number | null = null;
  private pending: string[] = [];
  private written = 0;

  constructor(readonly name: string) {}

  get bytesWritten(): number {
    return this.written;
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  open(): void {
    if (this.fd !== null) {
      throw new OutputWriteError(`Output '${this.name}' is already open`);
    }
    try {
      this.fd = fs.openSync(this.name, 'w');
    } catch (error) {
      throw new OutputWriteError(`Could not open '${this.name}': ${describe(error)}`, { cause: error });
    }
  }

  write(text: string): void {
    if (this.fd === null) {
      throw new OutputWriteError(`Cannot write to '${this.name}': output is not open`);
    }
    this.pending.push(text);
  }

  flush(): void {
    if (this.fd === null || this.pending.length === 0) return;

    const chunk = this.pending.join('');
    this.pending = [];
    try {
      fs.writeSync(this.fd, chunk, null, 'utf-8');
    } catch (error) {
      throw new OutputWriteError(`Could not write to '${this.name}': ${describe(error)}`, { cause: error });
    }
    this.written += Buffer.byteLength(chunk, 'utf-8');
  }

  close(): void {
    const fd = this.fd;
    if (fd === null) return;

    let failure: OutputWriteError | undefined;
    try {
      this.flush();
    } catch (error) {
      failure = error instanceof OutputWriteError
        ? error
        : new OutputWriteError(`Could not write to '${this.name}': ${describe(error)}`, { cause: error });
    }

    this.fd = null;
    this.pending = [];
    try {
      fs.closeSync(fd);
    } catch (error) {
      // The first failure wins
      if (!failure) {
        failure = new OutputWriteError(`Could not close '${this.name}': ${describe(error)}`, { cause: error });
      }
    }

    if (failure) {
      throw failure;
    }
  }
}

/**
 * Accumulates output in memory. Used by the HTTP routes and tests.
 */
export class MemorySink implements GcodeSink {
  private chunks: string[] = [];
  private opened = false;
  private closed = false;
  private written = 0;

  constructor(readonly name: string) {}

  get bytesWritten(): number {
    return this.written;
  }

  get isOpen(): boolean {
    return this.opened && !this.closed;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get contents(): string {
    return this.chunks.join('');
  }

  open(): void {
    if (this.opened) {
      throw new OutputWriteError(`Output '${this.name}' has already been opened`);
    }
    this.opened = true;
  }

  write(text: string): void {
    if (!this.isOpen) {
      throw new OutputWriteError(`Cannot write to '${this.name}': output is not open`);
    }
    this.chunks.push(text);
    this.written += Buffer.byteLength(text, 'utf-8');
  }

  flush(): void {
    // Nothing buffered beyond `chunks`
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Exact-length reads over a byte stream.
 *
 * Sockets deliver data in chunks of arbitrary size. `ExactReader` buffers
 * incoming chunks and resolves each `read(n)` only once `n` bytes are
 * available, so framing code never sees a short read.
 */

import type { Readable } from 'node:stream';

import { FramingError } from '@/protocol/errors.js';

interface PendingRead {
  size: number;
  resolve: (bytes: Buffer) => void;
  reject: (error: Error) => void;
}

/**
 * Buffer for accumulating stream chunks and serving fixed-size reads.
 */
export class ExactReader {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private received = 0;
  private pending: PendingRead | null = null;
  private failure: Error | null = null;
  private ended = false;

  constructor(stream: Readable) {
    stream.on('data', (chunk: Buffer | string) => {
      this.push(typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk);
    });
    stream.once('end', () => this.finish());
    stream.once('close', () => this.finish());
  }

  /**
   * Total bytes received from the stream so far.
   */
  get bytesReceived(): number {
    return this.received;
  }

  /**
   * Read exactly `size` bytes.
   *
   * @throws FramingError when the stream ends first
   * @throws The error passed to `fail()` when the owner aborts the reader
   */
  read(size: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new Error('ExactReader supports one pending read at a time'));
    }
    if (size === 0) {
      return Promise.resolve(Buffer.alloc(0));
    }

    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { size, resolve, reject };
      this.settle();
    });
  }

  /**
   * Abort the current and all future reads with `error`.
   *
   * The first failure wins; later calls are ignored.
   */
  fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    this.settle();
  }

  private push(chunk: Buffer): void {
    if (chunk.length === 0) return;
    this.chunks.push(chunk);
    this.buffered += chunk.length;
    this.received += chunk.length;
    this.settle();
  }

  private finish(): void {
    this.ended = true;
    this.settle();
  }

  private settle(): void {
    const pending = this.pending;
    if (!pending) return;

    if (this.buffered >= pending.size) {
      this.pending = null;
      pending.resolve(this.take(pending.size));
      return;
    }

    if (this.failure) {
      this.pending = null;
      pending.reject(this.failure);
      return;
    }

    if (this.ended) {
      this.pending = null;
      pending.reject(
        new FramingError(
          `Connection closed after ${this.buffered} of ${pending.size} expected bytes`
        )
      );
    }
  }

  private take(size: number): Buffer {
    const joined = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks);
    const all = joined ?? Buffer.alloc(0);
    const result = Buffer.from(all.subarray(0, size));
    const rest = all.subarray(size);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return result;
  }
}

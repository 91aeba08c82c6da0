/**
 * Streaming body capture
 *
 * Mirrors a response body into memory while the caller consumes it and
 * hands the bytes to a commit callback once the body has been read in
 * full. A body abandoned part way is never committed.
 */

import { Readable, finished } from 'node:stream';
import type { Logger } from 'pino';
import { componentLogger } from './logger.mjs';

export type CaptureOutcome = 'committed' | 'discarded' | 'failed';

export type CommitCallback = (body: Buffer) => unknown;

export interface BodyCaptureOptions {
  /** Content-Length announced by the origin; a body of any other size is discarded */
  expectedLength?: number;
  logger?: Logger;
}

type CaptureState = 'capturing' | 'committing' | CaptureOutcome;

function toBuffer(chunk: Buffer | Uint8Array | string): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  return typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk);
}

/**
 * Push-style capture: feed it chunks, then finish or abandon.
 * The commit callback runs at most once.
 */
export class BodyCapture {
  readonly settled: Promise<CaptureOutcome>;

  private chunks: Buffer[] = [];
  private received = 0;
  private state: CaptureState = 'capturing';
  private readonly resolveSettled: (outcome: CaptureOutcome) => void;
  private readonly expectedLength?: number;
  private readonly logger: Logger;

  constructor(
    private readonly onCommit: CommitCallback,
    options: BodyCaptureOptions = {}
  ) {
    let resolve: (outcome: CaptureOutcome) => void = () => undefined;
    this.settled = new Promise<CaptureOutcome>((r) => {
      resolve = r;
    });
    this.resolveSettled = resolve;
    this.expectedLength = options.expectedLength;
    this.logger = options.logger ?? componentLogger('body-capture');
  }

  get capturing(): boolean {
    return this.state === 'capturing';
  }

  get byteLength(): number {
    return this.received;
  }

  append(chunk: Buffer | Uint8Array | string): void {
    if (this.state !== 'capturing') return;
    const buffer = toBuffer(chunk);
    this.chunks.push(buffer);
    this.received += buffer.length;
  }

  /**
   * The body ended normally: commit what was captured
   */
  finish(): void {
    if (this.state !== 'capturing') return;

    if (this.expectedLength !== undefined && this.received !== this.expectedLength) {
      this.logger.debug(
        { expected: this.expectedLength, received: this.received },
        'captured body length does not match content-length, not caching'
      );
      this.settle('discarded');
      return;
    }

    const body = Buffer.concat(this.chunks, this.received);
    this.chunks = [];
    this.state = 'committing';

    let result: unknown;
    try {
      result = this.onCommit(body);
    } catch (error) {
      this.fail(error);
      return;
    }

    Promise.resolve(result).then(
      () => this.settle('committed'),
      (error: unknown) => this.fail(error)
    );
  }

  /**
   * The body was closed or failed before its end: drop the captured bytes
   */
  abandon(): void {
    if (this.state !== 'capturing') return;
    this.settle('discarded');
  }

  private fail(error: unknown): void {
    this.logger.warn({ err: error }, 'cache commit failed');
    this.settle('failed');
  }

  private settle(outcome: CaptureOutcome): void {
    this.chunks = [];
    this.state = outcome;
    this.resolveSettled(outcome);
  }
}

/**
 * Readable that wraps a response body, passing every chunk through
 * unchanged while capturing it. Commits when the caller reads to the end,
 * discards when the stream is destroyed first. Errors from the source are
 * passed on as they are; a source that closes before its end destroys the
 * wrapper with ERR_STREAM_PREMATURE_CLOSE.
 */
export class CaptureReadable extends Readable {
  readonly capture: BodyCapture;

  constructor(
    private readonly source: Readable,
    onCommit: CommitCallback,
    options: BodyCaptureOptions = {}
  ) {
    super();
    this.capture = new BodyCapture(onCommit, options);

    source.pause();
    source.on('data', (chunk: Buffer | string) => {
      const buffer = toBuffer(chunk);
      this.capture.append(buffer);
      if (!this.push(buffer)) {
        source.pause();
      }
    });
    source.once('end', () => {
      this.push(null);
    });
    finished(source, (error) => {
      if (error && !this.destroyed) {
        this.destroy(error);
      }
    });

    this.once('end', () => {
      this.capture.finish();
    });
  }

  get settled(): Promise<CaptureOutcome> {
    return this.capture.settled;
  }

  override _read(): void {
    this.source.resume();
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.capture.abandon();
    if (!this.source.destroyed) {
      this.source.destroy();
    }
    callback(error);
  }
}

/**
 * Read a body stream to the end
 */
export async function collectBody(
  body: Readable | AsyncIterable<Buffer | Uint8Array | string>
): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(toBuffer(chunk));
  }
  return Buffer.concat(chunks);
}

/**
 * Wrap a buffer in a byte stream
 */
export function bufferToStream(body: Buffer): Readable {
  return Readable.from(body.length > 0 ? [body] : [], { objectMode: false });
}

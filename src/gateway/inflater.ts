/**
 * zlib-stream transport compression.
 * The whole connection shares one deflate context; a message may span
 * several binary frames and is complete once a frame ends in the
 * Z_SYNC_FLUSH marker 00 00 ff ff.
 */

import { createInflate, constants, type Inflate } from 'node:zlib';

const ZLIB_SUFFIX = Buffer.from([0x00, 0x00, 0xff, 0xff]);

export function endsWithFlushMarker(chunk: Buffer): boolean {
  return chunk.length >= ZLIB_SUFFIX.length && chunk.subarray(chunk.length - ZLIB_SUFFIX.length).equals(ZLIB_SUFFIX);
}

/** Inflates zlib-stream frames for one connection. Create a new one per connection. */
export class ZlibStreamInflater {
  private readonly inflate: Inflate;
  private fragments: Buffer[] = [];
  private output: Buffer[] = [];
  private failure: Error | undefined;

  constructor() {
    this.inflate = createInflate({ chunkSize: 65535, flush: constants.Z_SYNC_FLUSH });
    this.inflate.on('data', (chunk: Buffer) => {
      this.output.push(chunk);
    });
    this.inflate.on('error', (err: Error) => {
      this.failure = err;
    });
  }

  /** True while fragments of an unfinished message are buffered. */
  get hasPartialMessage(): boolean {
    return this.fragments.length > 0;
  }

  /**
   * Add one binary frame.
   * Resolves to the decoded text once the message is complete, or to
   * undefined while more fragments are expected.
   */
  async push(fragment: Buffer): Promise<string | undefined> {
    this.fragments.push(fragment);
    if (!endsWithFlushMarker(fragment)) {
      return undefined;
    }

    const data = this.fragments.length === 1 ? fragment : Buffer.concat(this.fragments);
    this.fragments = [];
    if (this.failure) {
      throw this.failure;
    }

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => reject(err);
      this.inflate.once('error', onError);
      this.inflate.write(data, (err) => {
        this.inflate.off('error', onError);
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });

    const text = Buffer.concat(this.output).toString('utf8');
    this.output = [];
    return text;
  }

  close(): void {
    this.fragments = [];
    this.output = [];
    this.inflate.destroy();
  }
}

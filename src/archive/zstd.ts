/**
 * zstd streams. Compression runs the reference encoder compiled to
 * WebAssembly; decompression uses a pure TypeScript decoder.
 *
 * The encoder compresses whole buffers, so input is cut into blocks and
 * each block becomes one frame. A sequence of frames is a valid zstd
 * stream for any decoder.
 */

import { Transform } from 'node:stream';
import type { TransformCallback } from 'node:stream';
import { compress, init } from '@bokuweb/zstd-wasm';
import { Decompress } from 'fzstd';
import { toError } from '../errors.js';

const FRAME_BLOCK_SIZE = 4 * 1024 * 1024;
const COMPRESSION_LEVEL = 3;

let encoderReady: Promise<void> | undefined;

function loadEncoder(): Promise<void> {
  encoderReady ??= init();
  return encoderReady;
}

export class ZstdCompressStream extends Transform {
  private pending: Buffer[] = [];
  private pendingBytes = 0;

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.pending.push(chunk);
    this.pendingBytes += chunk.length;
    if (this.pendingBytes < FRAME_BLOCK_SIZE) {
      callback();
      return;
    }
    this.emitFrame().then(
      () => callback(),
      (err: unknown) => callback(toError(err))
    );
  }

  _flush(callback: TransformCallback): void {
    this.emitFrame().then(
      () => callback(),
      (err: unknown) => callback(toError(err))
    );
  }

  private async emitFrame(): Promise<void> {
    if (this.pendingBytes === 0) return;
    await loadEncoder();
    const block = Buffer.concat(this.pending);
    this.pending = [];
    this.pendingBytes = 0;
    this.push(Buffer.from(compress(block, COMPRESSION_LEVEL)));
  }
}

export class ZstdDecompressStream extends Transform {
  private readonly decoder: Decompress;

  constructor() {
    super();
    this.decoder = new Decompress((data) => {
      this.push(Buffer.from(data));
    });
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    try {
      this.decoder.push(chunk);
      callback();
    } catch (err) {
      callback(toError(err));
    }
  }

  _flush(callback: TransformCallback): void {
    try {
      this.decoder.push(new Uint8Array(0), true);
      callback();
    } catch (err) {
      callback(toError(err));
    }
  }
}

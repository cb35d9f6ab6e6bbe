/**
 * @module core/io
 *
 * 解释器的字节输入源与输出端实现。
 *
 * - BufferSource / BufferSink：内存缓冲，供 `runProgram` 与测试使用
 * - StdinSource / StdoutSink：同步读写文件描述符，供 CLI 使用
 *
 * 读写错误原样抛出，不做重试或包装。
 */

import { readSync, writeSync } from 'node:fs';
import type { ByteSink, ByteSource } from '../types.js';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8');

export type ByteInput = Uint8Array | readonly number[] | string;

function toBytes(input: ByteInput): Uint8Array {
  if (typeof input === 'string') return textEncoder.encode(input);
  if (input instanceof Uint8Array) return input;
  return Uint8Array.from(input, byte => byte & 0xff);
}

export class BufferSource implements ByteSource {
  private readonly bytes: Uint8Array;
  private cursor = 0;

  constructor(input: ByteInput = new Uint8Array(0)) {
    this.bytes = toBytes(input);
  }

  read(): number | null {
    if (this.cursor >= this.bytes.length) return null;
    const byte = this.bytes[this.cursor] ?? 0;
    this.cursor++;
    return byte;
  }

  /** 已读取的字节数 */
  get consumed(): number {
    return this.cursor;
  }

  get remaining(): number {
    return this.bytes.length - this.cursor;
  }
}

export class BufferSink implements ByteSink {
  private buffer = new Uint8Array(256);
  private size = 0;

  write(byte: number): void {
    if (this.size === this.buffer.length) {
      const next = new Uint8Array(this.buffer.length * 2);
      next.set(this.buffer);
      this.buffer = next;
    }
    this.buffer[this.size++] = byte & 0xff;
  }

  get length(): number {
    return this.size;
  }

  bytes(): Uint8Array {
    return this.buffer.slice(0, this.size);
  }

  text(): string {
    return textDecoder.decode(this.bytes());
  }
}

export interface StdinSourceOptions {
  /** 文件描述符，默认 0 */
  readonly fd?: number;
  /** 每次阻塞读取前调用，通常用于刷新配对的输出端 */
  readonly beforeRead?: () => void;
}

/**
 * 从文件描述符同步逐字节读取。
 *
 * 读到 EOF 后记住状态，之后的 read() 直接返回 null。
 * 非阻塞的 stdin 可能报 EAGAIN，此时重试。
 */
export class StdinSource implements ByteSource {
  private readonly fd: number;
  private readonly beforeRead: (() => void) | undefined;
  private readonly scratch = Buffer.alloc(1);
  private ended = false;

  constructor(options: StdinSourceOptions = {}) {
    this.fd = options.fd ?? 0;
    this.beforeRead = options.beforeRead;
  }

  read(): number | null {
    if (this.ended) return null;
    this.beforeRead?.();
    for (;;) {
      let count: number;
      try {
        count = readSync(this.fd, this.scratch, 0, 1, null);
      } catch (err) {
        if (isErrno(err, 'EAGAIN')) continue;
        if (isErrno(err, 'EOF')) {
          count = 0;
        } else {
          throw err;
        }
      }
      if (count === 0) {
        this.ended = true;
        return null;
      }
      return this.scratch[0] ?? 0;
    }
  }
}

export interface StdoutSinkOptions {
  readonly fd?: number;
  readonly bufferSize?: number;
}

/** 缓冲写入文件描述符；调用方负责在结束时 flush() */
export class StdoutSink implements ByteSink {
  private readonly fd: number;
  private readonly buffer: Buffer;
  private size = 0;
  private total = 0;

  constructor(options: StdoutSinkOptions = {}) {
    this.fd = options.fd ?? 1;
    this.buffer = Buffer.alloc(options.bufferSize ?? 4096);
  }

  write(byte: number): void {
    this.buffer[this.size++] = byte & 0xff;
    this.total++;
    if (this.size === this.buffer.length) {
      this.flush();
    }
  }

  flush(): void {
    let offset = 0;
    while (offset < this.size) {
      offset += writeSync(this.fd, this.buffer, offset, this.size - offset);
    }
    this.size = 0;
  }

  /** 累计写入的字节数（含尚未刷新的部分） */
  get written(): number {
    return this.total;
  }
}

function isErrno(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

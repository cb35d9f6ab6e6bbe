/**
 * @module core/tape
 *
 * 向右增长的字节纸带。
 *
 * 逻辑长度每次只增长一格（与 `>` 语义一致），底层 `Uint8Array` 容量按倍数扩展。
 * 纸带只增不减；可选的 `maxSize` 限制逻辑长度上限。
 */

const INITIAL_CAPACITY = 1024;

export interface TapeOptions {
  /** 最大格数；省略表示不限制 */
  readonly maxSize?: number;
}

export class Tape {
  private cells: Uint8Array;
  private used = 1;
  readonly maxSize: number | null;

  constructor(options: TapeOptions = {}) {
    const { maxSize } = options;
    if (maxSize !== undefined && (!Number.isSafeInteger(maxSize) || maxSize < 1)) {
      throw new RangeError(`Tape maxSize must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = maxSize ?? null;
    this.cells = new Uint8Array(Math.min(INITIAL_CAPACITY, this.maxSize ?? INITIAL_CAPACITY));
  }

  /** 当前逻辑长度（已触及的格数） */
  get length(): number {
    return this.used;
  }

  get(index: number): number {
    this.checkIndex(index);
    return this.cells[index] ?? 0;
  }

  set(index: number, value: number): void {
    this.checkIndex(index);
    this.cells[index] = value & 0xff;
  }

  /**
   * 在右端追加一个零格。
   *
   * @returns 达到 maxSize 时返回 false，纸带保持不变
   */
  tryGrow(): boolean {
    if (this.maxSize !== null && this.used >= this.maxSize) {
      return false;
    }
    if (this.used === this.cells.length) {
      const doubled = this.cells.length * 2;
      const next = new Uint8Array(this.maxSize === null ? doubled : Math.min(doubled, this.maxSize));
      next.set(this.cells);
      this.cells = next;
    }
    this.used++;
    return true;
  }

  /** 逻辑范围内纸带内容的副本 */
  snapshot(): Uint8Array {
    return this.cells.slice(0, this.used);
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.used) {
      throw new RangeError(`Tape index ${index} outside 0..${this.used - 1}`);
    }
  }
}

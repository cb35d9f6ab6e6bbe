/**
 * @module jump-table
 *
 * 括号跳转表：LoopOpen 索引 ↔ 匹配的 LoopClose 索引，双向 O(1) 查询。
 *
 * 以 `Int32Array` 存储，非括号位置为 -1。对合法程序而言
 * `partner(partner(i)) === i` 恒成立。
 */

const NONE = -1;

export class JumpTable {
  private readonly links: Int32Array;
  private pairCount = 0;

  constructor(length: number) {
    this.links = new Int32Array(length).fill(NONE);
  }

  /** 记录一对匹配的括号（两个方向同时写入） */
  link(open: number, close: number): void {
    this.links[open] = close;
    this.links[close] = open;
    this.pairCount++;
  }

  /**
   * 返回索引 i 处括号的配对索引。
   *
   * @throws {RangeError} 当 i 不是括号指令时
   */
  partner(index: number): number {
    const target = index >= 0 && index < this.links.length ? this.links[index] : NONE;
    if (target === undefined || target === NONE) {
      throw new RangeError(`No bracket at instruction ${index}`);
    }
    return target;
  }

  has(index: number): boolean {
    return index >= 0 && index < this.links.length && this.links[index] !== NONE;
  }

  get size(): number {
    return this.pairCount;
  }

  get length(): number {
    return this.links.length;
  }

  /** 按 LoopOpen 索引升序列出所有 `[open, close]` 对 */
  *pairs(): IterableIterator<readonly [number, number]> {
    for (let i = 0; i < this.links.length; i++) {
      const other = this.links[i];
      if (other !== undefined && other > i) {
        yield [i, other] as const;
      }
    }
  }
}

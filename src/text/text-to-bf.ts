/**
 * @module text/text-to-bf
 *
 * 生成打印给定 ASCII 文本的 Brainfuck 程序。
 *
 * 生成的程序分两段：
 * 1. 把文本中出现过的字节去重排序后依次写入连续的格子；
 *    大于 10 的值用乘法循环 `f1 × f2 ± diff` 构造，其余直接重复 `+`
 * 2. 按原文顺序在这些格子之间移动并逐个输出
 */

import type { Position } from '../types.js';
import { DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';

/** 值 n 的构造方式：n = f1 * f2 + diff */
export interface FactorEntry {
  readonly f1: number;
  readonly f2: number;
  readonly diff: number;
}

const BYTE_MAX = 255;
/** 不超过该值的字节直接用重复的 `+` 构造 */
const PLAIN_LIMIT = 10;

/**
 * 生成打印 text 的程序。`\r` 被丢弃。
 *
 * @throws {DiagnosticError} G001 文本含非 ASCII 字符
 *
 * @example
 * ```typescript
 * textToBrainfuck('\n'); // '++++++++++><.'
 * ```
 */
export function textToBrainfuck(text: string): string {
  const bytes = textToBytes(text);
  const storeOrder = [...new Set(bytes)].sort((a, b) => a - b);
  return storeBytes(storeOrder) + printBytes(bytes, storeOrder, storeOrder.length);
}

function textToBytes(text: string): number[] {
  const bytes: number[] = [];
  let line = 1;
  let col = 1;

  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    if (code > 0x7f) {
      const pos: Position = { line, col };
      throw new DiagnosticError(Diagnostics.nonAsciiCharacter(char, pos).build());
    }
    if (char === '\r') continue;
    bytes.push(code);
    if (char === '\n') {
      line++;
      col = 1;
    } else {
      col++;
    }
  }

  return bytes;
}

/** 依次写入各字节；结束时数据指针位于 bytes.length */
function storeBytes(bytes: readonly number[]): string {
  const table = factorTable();
  let code = '';

  for (const byte of bytes) {
    const entry = table[byte];
    if (!entry) {
      code += '+'.repeat(byte) + '>';
      continue;
    }
    code += '>' + '+'.repeat(entry.f1) + '[<' + '+'.repeat(entry.f2) + '>-]';
    if (entry.diff > 0) {
      code += '<' + '+'.repeat(entry.diff) + '>';
    } else if (entry.diff < 0) {
      code += '<' + '-'.repeat(-entry.diff) + '>';
    }
  }

  return code;
}

function printBytes(text: readonly number[], storeOrder: readonly number[], position: number): string {
  let current = position;
  let code = '';

  for (const byte of text) {
    const target = storeOrder.indexOf(byte);
    const delta = target - current;
    if (delta > 0) {
      code += '>'.repeat(delta);
    } else if (delta < 0) {
      code += '<'.repeat(-delta);
    }
    current = target;
    code += '.';
  }

  return code;
}

let cachedTable: readonly (FactorEntry | null)[] | null = null;

/**
 * 0..255 每个值的因子构造表；不超过 10 的值为 null。
 *
 * 先为每个合数选出和最小的因子对，再剔除那些用相邻值的因子加减若干次更短的项，
 * 最后为每个值选取最近的保留项并记录差值。
 */
export function factorTable(): readonly (FactorEntry | null)[] {
  cachedTable ??= buildFactorTable();
  return cachedTable;
}

interface Candidate {
  readonly n: number;
  factors: [number, number];
}

const factorSum = (factors: readonly [number, number]): number => factors[0] + factors[1];

function buildFactorTable(): readonly (FactorEntry | null)[] {
  const work: Candidate[] = [];
  for (let n = 0; n <= BYTE_MAX; n++) {
    work.push({ n, factors: [BYTE_MAX, BYTE_MAX] });
  }

  for (let i = 2; i < BYTE_MAX; i++) {
    for (let j = i; j < BYTE_MAX; j++) {
      const product = i * j;
      if (product > BYTE_MAX) break;
      const current = work[product];
      if (current && i + j < Math.min(factorSum(current.factors), BYTE_MAX)) {
        current.factors = [i, j];
      }
    }
  }

  const kept = work.filter(({ n, factors }) => n > PLAIN_LIMIT && factors[0] !== BYTE_MAX);

  // 比前一项的因子再加若干次 `+` 更长的项没有保留价值
  let i = 1;
  while (i < kept.length) {
    const prev = kept[i - 1];
    const curr = kept[i];
    if (prev && curr && factorSum(curr.factors) >= factorSum(prev.factors) + (curr.n - prev.n)) {
      kept.splice(i, 1);
    } else {
      i++;
    }
  }

  // 同理，对比后一项
  for (let k = kept.length - 2; k >= 0; k--) {
    const curr = kept[k];
    const next = kept[k + 1];
    if (curr && next && factorSum(curr.factors) >= factorSum(next.factors) + (next.n - curr.n)) {
      kept.splice(k, 1);
    }
  }

  const available = new Map<number, readonly [number, number]>(kept.map(({ n, factors }) => [n, factors]));

  const table: (FactorEntry | null)[] = new Array<FactorEntry | null>(BYTE_MAX + 1).fill(null);
  for (let n = PLAIN_LIMIT + 1; n <= BYTE_MAX; n++) {
    const factors = nearestFactors(available, n);
    table[n] = Object.freeze({ f1: factors[0], f2: factors[1], diff: n - factors[0] * factors[1] });
  }

  return Object.freeze(table);
}

function nearestFactors(available: ReadonlyMap<number, readonly [number, number]>, n: number): readonly [number, number] {
  let low = n;
  let high = n;
  for (;;) {
    const below = available.get(low);
    const above = available.get(high);
    if (below && above) {
      return factorSum(below) < factorSum(above) ? below : above;
    }
    if (below) return below;
    if (above) return above;
    low = Math.max(low - 1, 0);
    high = Math.min(high + 1, BYTE_MAX);
  }
}

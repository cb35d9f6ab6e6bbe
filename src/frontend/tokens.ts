/**
 * @module tokens
 *
 * 指令字符表：源文本字符到 OpKind 的映射。其余字符一律视为注释。
 */

import { OpKind } from '../types.js';

export const OP_CHARS: Readonly<Record<string, OpKind>> = {
  '>': OpKind.MoveRight,
  '<': OpKind.MoveLeft,
  '+': OpKind.Increment,
  '-': OpKind.Decrement,
  '.': OpKind.Output,
  ',': OpKind.Input,
  '[': OpKind.LoopOpen,
  ']': OpKind.LoopClose,
};

const CHAR_OF: Readonly<Record<OpKind, string>> = {
  [OpKind.MoveRight]: '>',
  [OpKind.MoveLeft]: '<',
  [OpKind.Increment]: '+',
  [OpKind.Decrement]: '-',
  [OpKind.Output]: '.',
  [OpKind.Input]: ',',
  [OpKind.LoopOpen]: '[',
  [OpKind.LoopClose]: ']',
};

export function opForChar(ch: string): OpKind | undefined {
  return Object.hasOwn(OP_CHARS, ch) ? OP_CHARS[ch] : undefined;
}

export function charForOp(op: OpKind): string {
  return CHAR_OF[op];
}

export { OpKind };

// Core type definitions for brainforge

import type { JumpTable } from './frontend/jump-table.js';

export interface Position {
  readonly line: number;
  readonly col: number;
  /** 源文本中的 UTF-16 偏移量（从 0 开始）；合成位置可省略 */
  readonly offset?: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

/**
 * 八条指令的封闭枚举。
 *
 * 字符串成员便于日志与 JSON 输出直接阅读。
 */
export enum OpKind {
  MoveRight = 'MoveRight',
  MoveLeft = 'MoveLeft',
  Increment = 'Increment',
  Decrement = 'Decrement',
  Output = 'Output',
  Input = 'Input',
  LoopOpen = 'LoopOpen',
  LoopClose = 'LoopClose',
}

export interface Instruction {
  readonly op: OpKind;
  readonly pos: Position;
}

/**
 * 经过校验的程序：指令序列与括号跳转表。
 *
 * 只由 `lex()` 构造；解释器与转译器以只读方式共享同一实例。
 */
export interface Program {
  readonly instructions: readonly Instruction[];
  readonly jumps: JumpTable;
}

/** 单字节输入源；`null` 表示输入流结束 */
export interface ByteSource {
  read(): number | null;
}

/** 单字节输出端 */
export interface ByteSink {
  write(byte: number): void;
}

export type TargetName = 'rust' | 'c' | 'javascript';

export const TARGET_NAMES: readonly TargetName[] = ['rust', 'c', 'javascript'];

export function isTargetName(value: string): value is TargetName {
  return TARGET_NAMES.some(name => name === value);
}

/** 两次协作式取消检查之间的默认步数 */
export const DEFAULT_CHECK_INTERVAL = 65_536;

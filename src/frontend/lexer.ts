/**
 * @module lexer
 *
 * 词法分析与括号校验：把源文本转换为指令序列和跳转表。
 *
 * **功能**：
 * - 识别八个指令字符，其余字符（包括非 ASCII 字符）作为注释跳过
 * - 为每条指令记录行号、列号和偏移量，用于诊断
 * - 单遍扫描中用栈匹配括号，一次性构造跳转表，运行期无需再扫描括号
 *
 * **位置规则**：
 * - 行号、列号均从 1 开始；列按码点计数
 * - `\n`、`\r\n` 与单独的 `\r` 都视为一次换行
 */

import { opForChar } from './tokens.js';
import { JumpTable } from './jump-table.js';
import { OpKind } from '../types.js';
import type { Instruction, Position, Program } from '../types.js';
import { Diagnostics, DiagnosticError, type Diagnostic } from '../diagnostics/diagnostics.js';

export type SourceText = string | Uint8Array;

const utf8 = new TextDecoder('utf-8');

function decode(source: SourceText): string {
  return typeof source === 'string' ? source : utf8.decode(source);
}

/**
 * 对源文本进行词法分析与括号校验，生成 Program。
 *
 * 未匹配的 `]` 在遇到时立即报错；扫描结束后仍未闭合的 `[` 报告最早的一个，
 * 其余未闭合位置作为关联信息附带。
 *
 * @param source - 源文本（字节按 UTF-8 解码）
 * @returns 指令序列与跳转表
 *
 * @throws {DiagnosticError} L001 / L002 括号不匹配
 *
 * @example
 * ```typescript
 * const program = lex('+[->+<]');
 * program.jumps.partner(1); // 6
 * ```
 */
export function lex(source: SourceText): Program {
  const input = decode(source);
  const instructions: Instruction[] = [];
  const pairs: Array<[number, number]> = [];
  const pending: number[] = [];

  let line = 1;
  let col = 1;
  let offset = 0;
  let lastWasCR = false;

  for (const ch of input) {
    const op = opForChar(ch);
    if (op !== undefined) {
      const pos: Position = { line, col, offset };
      const index = instructions.length;
      instructions.push({ op, pos });

      if (op === OpKind.LoopOpen) {
        pending.push(index);
      } else if (op === OpKind.LoopClose) {
        const open = pending.pop();
        if (open === undefined) {
          throw new DiagnosticError(Diagnostics.unmatchedCloseBracket(pos).build());
        }
        pairs.push([open, index]);
      }
    }

    offset += ch.length;
    if (ch === '\n') {
      // CRLF 中的 \n 不再重复计行
      if (!lastWasCR) line++;
      col = 1;
      lastWasCR = false;
    } else if (ch === '\r') {
      line++;
      col = 1;
      lastWasCR = true;
    } else {
      col++;
      lastWasCR = false;
    }
  }

  if (pending.length > 0) {
    throw new DiagnosticError(unclosedDiagnostic(instructions, pending));
  }

  const jumps = new JumpTable(instructions.length);
  for (const [open, close] of pairs) {
    jumps.link(open, close);
  }

  return Object.freeze({ instructions: Object.freeze(instructions), jumps });
}

/**
 * 非抛出形式的校验，供 `check` 命令使用。
 *
 * @returns 诊断数组；合法程序返回空数组
 */
export function validate(source: SourceText): Diagnostic[] {
  try {
    lex(source);
    return [];
  } catch (err) {
    if (err instanceof DiagnosticError) {
      return [err.diagnostic];
    }
    throw err;
  }
}

function unclosedDiagnostic(instructions: readonly Instruction[], pending: readonly number[]): Diagnostic {
  const [earliest, ...rest] = pending.map(index => instructionAt(instructions, index).pos);
  const builder = Diagnostics.unmatchedOpenBracket(earliest);
  for (const pos of rest) {
    builder.withRelated({ start: pos, end: pos }, "Another unclosed '['");
  }
  return builder.build();
}

function instructionAt(instructions: readonly Instruction[], index: number): Instruction {
  const instruction = instructions[index];
  if (!instruction) {
    throw new RangeError(`Instruction index ${index} out of range`);
  }
  return instruction;
}

/**
 * @module codegen/transpiler
 *
 * 把已校验的 Program 一对一翻译为目标语言语句。
 *
 * 不做任何优化：每条指令恰好对应一条语句或一个循环块边界，
 * 保证生成程序与解释器的可观察行为一致。
 */

import { OpKind, type Position, type Program, type TargetName } from '../types.js';
import { DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';
import { getTarget, type CodegenTarget } from './targets/index.js';

/** 转译结果：目标语言与按嵌套深度缩进好的语句行 */
export interface GeneratedSource {
  readonly target: CodegenTarget;
  /** 相对于 main 函数体的语句行 */
  readonly lines: readonly string[];
  /** 最深的循环嵌套层数 */
  readonly maxDepth: number;
}

interface LoopMarker {
  readonly index: number;
  readonly pos: Position;
}

/**
 * 转译程序。
 *
 * 内部用标记栈重新配对括号，并与程序的跳转表交叉核对；
 * 对 lex() 产出的程序这两项检查永远不会失败。
 *
 * @throws {DiagnosticError} T001 循环栈下溢或残留 / T002 配对与跳转表不一致 / T003 未知目标
 */
export function transpile(program: Program, target: CodegenTarget | TargetName): GeneratedSource {
  const resolved = typeof target === 'string' ? getTarget(target) : target;
  const markers: LoopMarker[] = [];
  const lines: string[] = [];
  let maxDepth = 0;

  const indent = (depth: number): string => resolved.indentUnit.repeat(depth);

  program.instructions.forEach((instruction, index) => {
    switch (instruction.op) {
      case OpKind.LoopOpen:
        lines.push(indent(markers.length) + resolved.loopOpen);
        markers.push({ index, pos: instruction.pos });
        maxDepth = Math.max(maxDepth, markers.length);
        break;
      case OpKind.LoopClose: {
        const marker = markers.pop();
        if (!marker) {
          throw new DiagnosticError(
            Diagnostics.loopStackMismatch(`']' at instruction ${index} has no open loop`, instruction.pos).build(),
          );
        }
        const partner = program.jumps.has(index) ? program.jumps.partner(index) : -1;
        if (partner !== marker.index) {
          throw new DiagnosticError(Diagnostics.jumpTableDivergence(marker.index, index, instruction.pos).build());
        }
        lines.push(indent(markers.length) + resolved.loopClose);
        break;
      }
      default:
        lines.push(indent(markers.length) + resolved.statements[instruction.op]);
    }
  });

  const unclosed = markers[0];
  if (unclosed) {
    throw new DiagnosticError(
      Diagnostics.loopStackMismatch(`${markers.length} loop(s) left open at end of program`, unclosed.pos).build(),
    );
  }

  return Object.freeze({ target: resolved, lines: Object.freeze(lines), maxDepth });
}

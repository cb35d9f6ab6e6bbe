import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { transpile } from '../../../src/codegen/transpiler.js';
import { getTarget, rustTarget } from '../../../src/codegen/targets/index.js';
import { lex } from '../../../src/frontend/lexer.js';
import { JumpTable } from '../../../src/frontend/jump-table.js';
import { DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';
import { OpKind, type Instruction, type Program } from '../../../src/types.js';

function handMade(ops: readonly OpKind[], links: ReadonlyArray<readonly [number, number]>): Program {
  const instructions: Instruction[] = ops.map((op, index) => ({ op, pos: { line: 1, col: index + 1 } }));
  const jumps = new JumpTable(ops.length);
  for (const [open, close] of links) {
    jumps.link(open, close);
  }
  return { instructions, jumps };
}

function transpileError(program: Program): DiagnosticError {
  try {
    transpile(program, 'rust');
  } catch (error) {
    assert.ok(error instanceof DiagnosticError);
    return error;
  }
  assert.fail('transpile 应该失败');
}

describe('转译器', () => {
  test('每条指令对应一条语句，循环体按深度缩进', () => {
    const generated = transpile(lex('+[->+<]'), 'rust');
    assert.deepEqual(generated.lines, [
      'tape[ptr] = tape[ptr].wrapping_add(1);',
      'while tape[ptr] != 0 {',
      '    tape[ptr] = tape[ptr].wrapping_sub(1);',
      '    ptr += 1; if ptr == tape.len() { tape.push(0); }',
      '    tape[ptr] = tape[ptr].wrapping_add(1);',
      '    if ptr == 0 { underflow(&mut out); } ptr -= 1;',
      '}',
    ]);
  });

  test('C 目标的 I/O 语句', () => {
    assert.deepEqual(transpile(lex(',.'), 'c').lines, ['read_cell();', 'putchar(tape[ptr]);']);
  });

  test('javascript 目标使用两个空格缩进', () => {
    assert.deepEqual(transpile(lex('[>]'), 'javascript').lines, ['while (tape[ptr] !== 0) {', '  moveRight();', '}']);
  });

  test('记录最深嵌套层数', () => {
    assert.equal(transpile(lex('[[]][]'), 'c').maxDepth, 2);
    assert.equal(transpile(lex('+'), 'c').maxDepth, 0);
  });

  test('接受目标对象并冻结结果', () => {
    const generated = transpile(lex('+'), rustTarget);
    assert.equal(generated.target, rustTarget);
    assert.ok(Object.isFrozen(generated));
    assert.ok(Object.isFrozen(generated.lines));
  });

  test('空程序没有语句', () => {
    assert.deepEqual(transpile(lex(''), 'rust').lines, []);
  });

  test('未知目标报 T003', () => {
    assert.throws(
      () => transpile(lex('+'), getTarget('cobol')),
      (error: unknown) =>
        error instanceof DiagnosticError &&
        error.code === DiagnosticCode.T003_UnknownTarget &&
        error.message === "Unknown target 'cobol', valid values: rust, c, javascript"
    );
  });

  describe('结构一致性检查', () => {
    test('没有打开的循环时遇到 ] 报 T001', () => {
      const error = transpileError(handMade([OpKind.LoopClose], []));
      assert.equal(error.code, DiagnosticCode.T001_LoopStackMismatch);
      assert.equal(error.message, "Loop structure mismatch: ']' at instruction 0 has no open loop");
    });

    test('程序结束时仍有打开的循环报 T001', () => {
      const error = transpileError(handMade([OpKind.Increment, OpKind.LoopOpen], []));
      assert.equal(error.code, DiagnosticCode.T001_LoopStackMismatch);
      assert.deepEqual(error.pos, { line: 1, col: 2 });
    });

    test('标记栈与跳转表不一致报 T002', () => {
      const crossed = handMade(
        [OpKind.LoopOpen, OpKind.LoopOpen, OpKind.LoopClose, OpKind.LoopClose],
        [
          [0, 2],
          [1, 3],
        ]
      );
      const error = transpileError(crossed);
      assert.equal(error.code, DiagnosticCode.T002_JumpTableDivergence);
      assert.deepEqual(error.pos, { line: 1, col: 3 });
    });

    test('跳转表缺少配对也报 T002', () => {
      const error = transpileError(handMade([OpKind.LoopOpen, OpKind.LoopClose], []));
      assert.equal(error.code, DiagnosticCode.T002_JumpTableDivergence);
    });
  });
});

import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { lex, validate } from '../../../src/frontend/lexer.js';
import { DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';
import { OpKind } from '../../../src/types.js';

function lexError(source: string): DiagnosticError {
  try {
    lex(source);
  } catch (error) {
    assert.ok(error instanceof DiagnosticError, '应抛出 DiagnosticError');
    return error;
  }
  assert.fail(`lex(${JSON.stringify(source)}) 应该失败`);
}

describe('词法分析器', () => {
  test('应该识别八个指令字符并跳过注释', () => {
    const program = lex('a+b-c>d<e.f,g');
    assert.deepEqual(
      program.instructions.map(i => i.op),
      [OpKind.Increment, OpKind.Decrement, OpKind.MoveRight, OpKind.MoveLeft, OpKind.Output, OpKind.Input]
    );
  });

  test('应该记录从 1 开始的行列号与 UTF-16 偏移量', () => {
    const program = lex('x+ -');
    assert.deepEqual(program.instructions[0]?.pos, { line: 1, col: 2, offset: 1 });
    assert.deepEqual(program.instructions[1]?.pos, { line: 1, col: 4, offset: 3 });
  });

  test('空源码产生空程序', () => {
    const program = lex('');
    assert.equal(program.instructions.length, 0);
    assert.equal(program.jumps.size, 0);
  });

  test('只有注释的源码产生空程序', () => {
    assert.equal(lex('just words here').instructions.length, 0);
  });

  test('应该为括号建立双向跳转', () => {
    const program = lex('+[->+<]');
    assert.equal(program.jumps.partner(1), 6);
    assert.equal(program.jumps.partner(6), 1);
  });

  test('嵌套括号按最近匹配配对', () => {
    const program = lex('[[]]');
    assert.equal(program.jumps.partner(0), 3);
    assert.equal(program.jumps.partner(1), 2);
  });

  test('结果对象被冻结', () => {
    const program = lex('+');
    assert.ok(Object.isFrozen(program));
    assert.ok(Object.isFrozen(program.instructions));
  });

  test('应该接受 UTF-8 字节输入', () => {
    const program = lex(new TextEncoder().encode('é+'));
    assert.deepEqual(program.instructions[0]?.pos, { line: 1, col: 2, offset: 1 });
  });

  test('列号按码点计数，偏移量按 UTF-16 计数', () => {
    const program = lex('😀+');
    assert.deepEqual(program.instructions[0]?.pos, { line: 1, col: 2, offset: 2 });
  });

  describe('换行处理', () => {
    test('LF 换行', () => {
      assert.deepEqual(lex('\n\n+').instructions[0]?.pos, { line: 3, col: 1, offset: 2 });
    });

    test('CRLF 只计一次换行', () => {
      assert.deepEqual(lex('\r\n+').instructions[0]?.pos, { line: 2, col: 1, offset: 2 });
    });

    test('单独的 CR 也是换行', () => {
      assert.deepEqual(lex('\r+').instructions[0]?.pos, { line: 2, col: 1, offset: 1 });
    });

    test('CR CR LF 计为两次换行', () => {
      assert.deepEqual(lex('\r\r\n+').instructions[0]?.pos, { line: 3, col: 1, offset: 3 });
    });
  });

  describe('括号错误', () => {
    test('多余的 ] 报 L001 并指向该字符', () => {
      const error = lexError('+]');
      assert.equal(error.code, DiagnosticCode.L001_UnmatchedCloseBracket);
      assert.deepEqual(error.pos, { line: 1, col: 2, offset: 1 });
      assert.equal(error.message, "Unmatched ']' at line 1, column 2");
    });

    test('在匹配完成前遇到多余的 ] 立即报错', () => {
      const error = lexError('[]]');
      assert.equal(error.code, DiagnosticCode.L001_UnmatchedCloseBracket);
      assert.equal(error.pos.col, 3);
    });

    test('未闭合的 [ 报 L002 并指向最早的一个', () => {
      const error = lexError('[\n[+');
      assert.equal(error.code, DiagnosticCode.L002_UnmatchedOpenBracket);
      assert.deepEqual(error.pos, { line: 1, col: 1, offset: 0 });
      assert.equal(error.message, "Unmatched '[' at line 1, column 1");

      const related = error.diagnostic.relatedInformation ?? [];
      assert.equal(related.length, 1);
      assert.deepEqual(related[0]?.span.start, { line: 2, col: 1, offset: 2 });
      assert.equal(related[0]?.message, "Another unclosed '['");
    });

    test('同时存在多余的 ] 与未闭合的 [ 时先报 L001', () => {
      for (const [source, col] of [
        ['][', 1],
        [']+[', 1],
        ['+[]]+[', 4],
      ] as const) {
        const error = lexError(source);
        assert.equal(error.code, DiagnosticCode.L001_UnmatchedCloseBracket, source);
        assert.equal(error.pos.col, col, source);
      }
    });

    test('已闭合的 [ 不计入未闭合列表', () => {
      const error = lexError('[[]');
      assert.deepEqual(error.pos, { line: 1, col: 1, offset: 0 });
      assert.equal(error.diagnostic.relatedInformation, undefined);
    });
  });

  describe('validate', () => {
    test('合法程序返回空数组', () => {
      assert.deepEqual(validate('+[-]'), []);
    });

    test('非法程序返回单个诊断', () => {
      const diagnostics = validate('[');
      assert.equal(diagnostics.length, 1);
      assert.equal(diagnostics[0]?.code, DiagnosticCode.L002_UnmatchedOpenBracket);
    });
  });
});

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { textCommand } from '../../../src/cli/commands/text.js';
import { DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';
import { withTempDir } from '../../helpers/fixtures.js';

describe('text 命令', () => {
  it('--literal 把参数当作文本', () => {
    const written: string[] = [];
    const program = textCommand('A', { literal: true }, text => written.push(text));
    assert.equal(program, '>++++++++[<++++++++>-]<+><.');
    assert.deepEqual(written, ['>++++++++[<++++++++>-]<+><.\n']);
  });

  it('默认读取文件内容', async () => {
    await withTempDir(dir => {
      const file = join(dir, 'greeting.txt');
      writeFileSync(file, 'Hi');
      const written: string[] = [];
      textCommand(file, {}, text => written.push(text));
      assert.deepEqual(written, ['>++++++++[<+++++++++>-]>++++++++[<+++++++++++++>-]<+><<.>.\n']);
    });
  });

  it('非 ASCII 文本报 G001 且不输出', () => {
    const written: string[] = [];
    assert.throws(
      () => textCommand('naïve', { literal: true }, text => written.push(text)),
      (error: unknown) =>
        error instanceof DiagnosticError &&
        error.code === DiagnosticCode.G001_NonAsciiCharacter &&
        error.message === "Non-ASCII character 'ï' at line 1, column 3"
    );
    assert.equal(written.length, 0);
  });
});

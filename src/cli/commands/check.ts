import { readFileSync } from 'node:fs';
import { lex, validate } from '../../frontend/lexer.js';
import { formatDiagnostic } from '../../diagnostics/diagnostics.js';
import { error, note, success } from '../utils/logger.js';

/**
 * 只做词法分析与括号校验，输出带源码摘录的诊断。
 *
 * @returns 源文件是否有效
 */
export function checkCommand(file: string): boolean {
  const source = readFileSync(file, 'utf8');
  const diagnostics = validate(source);

  if (diagnostics.length === 0) {
    const program = lex(source);
    success(`${file}: ${program.instructions.length} instructions, ${program.jumps.size} loops`);
    return true;
  }

  for (const diagnostic of diagnostics) {
    const [headline = '', ...details] = formatDiagnostic(diagnostic, source).split('\n');
    error(`${file}: ${headline}`);
    for (const line of details) {
      note(line);
    }
  }
  return false;
}

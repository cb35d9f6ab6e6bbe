/**
 * @module frontend
 *
 * 编译器前端模块：词法分析、括号校验与跳转表。
 *
 * 包含：
 * - 词法分析器 (lexer)
 * - 指令字符表 (tokens)
 * - 跳转表 (jump-table)
 */

export { lex, validate } from './lexer.js';
export type { SourceText } from './lexer.js';
export { OP_CHARS, opForChar, charForOp } from './tokens.js';
export { JumpTable } from './jump-table.js';

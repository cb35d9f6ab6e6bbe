/**
 * @module brainforge
 *
 * Brainfuck 工具链的主要 API 接口。
 *
 * 前端把源码校验为 Program（指令序列 + 跳转表），两个后端共享同一份 Program：
 *
 * ```
 * 源码 → lex → Program ─┬→ interpret → 输出字节
 *                        └→ transpile → emit → 目标语言源码
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { lex, runProgram, transpile, emit } from 'brainforge';
 *
 * const program = lex('++++++++[>++++++++<-]>+.');
 * const result = runProgram(program);          // result.output → [65]
 * const rust = emit(transpile(program, 'rust')); // 完整的 main.rs
 * ```
 */

// 前端
export { lex, validate, JumpTable, OP_CHARS, opForChar, charForOp, type SourceText } from './frontend/index.js';

// 解释器
export {
  Interpreter,
  ExecutionError,
  interpret,
  runProgram,
  type InterpreterOptions,
  type ExecutionOutcome,
  type ExecutionSummary,
  type CancelReason,
  type RunResult,
} from './core/interpreter.js';
export { Tape, type TapeOptions } from './core/tape.js';
export {
  BufferSource,
  BufferSink,
  StdinSource,
  StdoutSink,
  type ByteInput,
  type StdinSourceOptions,
  type StdoutSinkOptions,
} from './core/io.js';

// 代码生成
export * from './codegen/index.js';

// 文本生成
export { textToBrainfuck, factorTable, type FactorEntry } from './text/text-to-bf.js';

// 配置
export { ConfigService, DEFAULT_TARGET } from './config/config-service.js';
export {
  loadProjectConfig,
  validateProjectConfig,
  resolveSettings,
  PROJECT_CONFIG_FILE,
  type ProjectConfig,
  type ResolvedSettings,
} from './config/project-config.js';

// 诊断
export * from './diagnostics/index.js';

// 类型
export {
  OpKind,
  TARGET_NAMES,
  DEFAULT_CHECK_INTERVAL,
  isTargetName,
  type Position,
  type Span,
  type Instruction,
  type Program,
  type ByteSource,
  type ByteSink,
  type TargetName,
} from './types.js';

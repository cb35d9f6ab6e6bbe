/**
 * @module core/interpreter
 *
 * 纸带解释器：在可增长的字节纸带上逐条执行已校验的 Program。
 *
 * 固定策略：
 * - `<` 越过第 0 格时报 E001，不回绕、不钳制
 * - `,` 遇到输入结束时保持当前格不变
 * - 纸带默认不限长度；配置 maxTape 后超出报 E002
 *
 * 非终止程序通过协作式取消检查中止，结果是 `cancelled` 而不是错误。
 */

import { DEFAULT_CHECK_INTERVAL, OpKind } from '../types.js';
import type { ByteSink, ByteSource, Instruction, Program } from '../types.js';
import { lex, type SourceText } from '../frontend/lexer.js';
import { DiagnosticError, Diagnostics, type Diagnostic } from '../diagnostics/diagnostics.js';
import type { Logger } from '../utils/logger.js';
import { Tape } from './tape.js';
import { BufferSink, BufferSource, type ByteInput } from './io.js';

// ============================================================================
// 公共接口
// ============================================================================

export interface InterpreterOptions {
  /** 纸带最大格数；省略表示不限制 */
  readonly maxTape?: number;
  /** 协作式取消检查；每 checkInterval 步调用一次，返回 true 即停止 */
  readonly shouldCancel?: () => boolean;
  /** 两次取消检查之间的步数，默认 65 536 */
  readonly checkInterval?: number;
  /** 执行步数上限；达到后以 `step-limit` 原因取消 */
  readonly maxSteps?: number;
  /** 运行结束时写入 debug 摘要；省略则不记录 */
  readonly logger?: Logger;
}

export type CancelReason = 'requested' | 'step-limit';

/** 一次运行结束（或中止）时的执行状态 */
export interface ExecutionSummary {
  readonly steps: number;
  readonly instructionPointer: number;
  readonly dataPointer: number;
  readonly bytesRead: number;
  readonly bytesWritten: number;
  /** 逻辑纸带内容的副本 */
  readonly tape: Uint8Array;
}

export type ExecutionOutcome =
  | (ExecutionSummary & { readonly status: 'completed' })
  | (ExecutionSummary & { readonly status: 'cancelled'; readonly reason: CancelReason });

/**
 * 运行期错误（E001 / E002）。
 *
 * 已写入输出端的字节保持原样；summary 记录出错时的执行状态。
 */
export class ExecutionError extends DiagnosticError {
  constructor(diagnostic: Diagnostic, readonly summary: ExecutionSummary) {
    super(diagnostic);
    this.name = 'ExecutionError';
  }
}

export class Interpreter {
  private readonly instructions: readonly Instruction[];
  private readonly maxTape: number | undefined;
  private readonly shouldCancel: (() => boolean) | undefined;
  private readonly checkInterval: number;
  private readonly maxSteps: number | undefined;
  private readonly logger: Logger | undefined;
  private ran = false;

  constructor(
    private readonly program: Program,
    private readonly input: ByteSource,
    private readonly output: ByteSink,
    options: InterpreterOptions = {},
  ) {
    const checkInterval = options.checkInterval ?? DEFAULT_CHECK_INTERVAL;
    if (!Number.isSafeInteger(checkInterval) || checkInterval < 1) {
      throw new RangeError(`checkInterval must be a positive integer, got ${checkInterval}`);
    }
    if (options.maxSteps !== undefined && (!Number.isSafeInteger(options.maxSteps) || options.maxSteps < 0)) {
      throw new RangeError(`maxSteps must be a non-negative integer, got ${options.maxSteps}`);
    }
    if (options.maxTape !== undefined && (!Number.isSafeInteger(options.maxTape) || options.maxTape < 1)) {
      throw new RangeError(`maxTape must be a positive integer, got ${options.maxTape}`);
    }
    this.instructions = program.instructions;
    this.maxTape = options.maxTape;
    this.shouldCancel = options.shouldCancel;
    this.checkInterval = checkInterval;
    this.maxSteps = options.maxSteps;
    this.logger = options.logger;
  }

  /**
   * 执行程序直到结束、取消或出错。
   *
   * 每个 Interpreter 实例只运行一次，保证每次运行都有全新的纸带与游标。
   *
   * @throws {ExecutionError} E001 指针下溢 / E002 纸带超限
   * @throws 输入源或输出端抛出的错误，原样传播
   */
  execute(): ExecutionOutcome {
    if (this.ran) {
      throw new Error('Interpreter.execute() may only be called once per instance');
    }
    this.ran = true;

    const tape = this.maxTape === undefined ? new Tape() : new Tape({ maxSize: this.maxTape });
    const { instructions, input, output, shouldCancel, maxSteps } = this;
    const jumps = this.program.jumps;
    const length = instructions.length;

    let ip = 0;
    let dp = 0;
    let steps = 0;
    let bytesRead = 0;
    let bytesWritten = 0;
    let countdown = this.checkInterval;

    const summary = (): ExecutionSummary => ({
      steps,
      instructionPointer: ip,
      dataPointer: dp,
      bytesRead,
      bytesWritten,
      tape: tape.snapshot(),
    });

    while (ip < length) {
      if (steps === maxSteps) {
        return this.finish({ ...summary(), status: 'cancelled', reason: 'step-limit' });
      }
      if (shouldCancel) {
        if (countdown === 0) {
          countdown = this.checkInterval;
          if (shouldCancel()) {
            return this.finish({ ...summary(), status: 'cancelled', reason: 'requested' });
          }
        }
        countdown--;
      }

      const instruction = instructions[ip];
      if (!instruction) break;

      switch (instruction.op) {
        case OpKind.MoveRight:
          if (dp + 1 === tape.length && !tape.tryGrow()) {
            throw new ExecutionError(
              Diagnostics.tapeLimitExceeded(tape.maxSize ?? tape.length, instruction.pos).build(),
              summary(),
            );
          }
          dp++;
          break;
        case OpKind.MoveLeft:
          if (dp === 0) {
            throw new ExecutionError(Diagnostics.pointerUnderflow(instruction.pos).build(), summary());
          }
          dp--;
          break;
        case OpKind.Increment:
          tape.set(dp, tape.get(dp) + 1);
          break;
        case OpKind.Decrement:
          tape.set(dp, tape.get(dp) - 1);
          break;
        case OpKind.Output:
          output.write(tape.get(dp));
          bytesWritten++;
          break;
        case OpKind.Input: {
          const byte = input.read();
          if (byte !== null) {
            tape.set(dp, byte);
            bytesRead++;
          }
          break;
        }
        case OpKind.LoopOpen:
          if (tape.get(dp) === 0) {
            ip = jumps.partner(ip);
          }
          break;
        case OpKind.LoopClose:
          if (tape.get(dp) !== 0) {
            ip = jumps.partner(ip);
          }
          break;
      }

      ip++;
      steps++;
    }

    return this.finish({ ...summary(), status: 'completed' });
  }

  private finish(outcome: ExecutionOutcome): ExecutionOutcome {
    this.logger?.debug('run finished', {
      status: outcome.status,
      steps: outcome.steps,
      tape_length: outcome.tape.length,
      bytes_read: outcome.bytesRead,
      bytes_written: outcome.bytesWritten,
    });
    return outcome;
  }
}

/**
 * 在给定输入源与输出端上执行已校验的程序。
 */
export function interpret(
  program: Program,
  input: ByteSource,
  output: ByteSink,
  options: InterpreterOptions = {},
): ExecutionOutcome {
  return new Interpreter(program, input, output, options).execute();
}

// ============================================================================
// 缓冲区入 / 缓冲区出
// ============================================================================

export type RunResult =
  | { readonly status: 'completed'; readonly output: Uint8Array; readonly steps: number }
  | {
      readonly status: 'cancelled';
      readonly output: Uint8Array;
      readonly steps: number;
      readonly reason: CancelReason;
    }
  | {
      readonly status: 'failed';
      readonly output: Uint8Array;
      readonly steps: number;
      readonly error: ExecutionError;
    };

/**
 * 词法分析并在内存缓冲区上运行源程序。
 *
 * 运行期错误不会抛出，而是以 `failed` 结果返回，并附带已产生的输出。
 *
 * @throws {DiagnosticError} L001 / L002 语法错误（此时不会开始运行）
 *
 * @example
 * ```typescript
 * const result = runProgram(',[.,]', 'abc\0');
 * // result.status === 'completed', result.output 为 [97, 98, 99]
 * ```
 */
export function runProgram(source: SourceText | Program, input: ByteInput = '', options: InterpreterOptions = {}): RunResult {
  const program = isProgram(source) ? source : lex(source);
  const sink = new BufferSink();
  try {
    const outcome = interpret(program, new BufferSource(input), sink, options);
    if (outcome.status === 'cancelled') {
      return { status: 'cancelled', output: sink.bytes(), steps: outcome.steps, reason: outcome.reason };
    }
    return { status: 'completed', output: sink.bytes(), steps: outcome.steps };
  } catch (err) {
    if (err instanceof ExecutionError) {
      return { status: 'failed', output: sink.bytes(), steps: err.summary.steps, error: err };
    }
    throw err;
  }
}

function isProgram(value: SourceText | Program): value is Program {
  return typeof value === 'object' && 'instructions' in value && 'jumps' in value;
}

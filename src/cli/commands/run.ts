import { performance } from 'node:perf_hooks';
import { lex } from '../../frontend/lexer.js';
import { interpret, type ExecutionOutcome, type InterpreterOptions } from '../../core/interpreter.js';
import { StdinSource, StdoutSink } from '../../core/io.js';
import { loadProjectConfig, resolveSettings } from '../../config/project-config.js';
import type { ByteSink, ByteSource } from '../../types.js';
import { createLogger, logPerformance } from '../../utils/logger.js';
import { readSource } from '../utils/files.js';
import { warn } from '../utils/logger.js';

export interface RunOptions {
  maxTape?: number;
  maxSteps?: number;
  /** 墙钟超时（毫秒），通过协作式取消检查实现 */
  timeout?: number;
  config?: string;
}

export interface FlushableSink extends ByteSink {
  flush(): void;
}

export interface RunStreams {
  input?: ByteSource;
  output?: FlushableSink;
}

/**
 * 解释执行源文件：stdin 作为程序输入，程序输出写到 stdout。
 *
 * 运行期错误（E001 / E002）在刷新已产生的输出后向上抛出；
 * 超时或步数耗尽返回 `cancelled`，由调用方决定退出码。
 */
export function runCommand(file: string, options: RunOptions, streams: RunStreams = {}): ExecutionOutcome {
  const started = performance.now();
  const program = lex(readSource(file));
  const flags = options.maxTape === undefined ? {} : { maxTape: options.maxTape };
  const settings = resolveSettings(flags, loadProjectConfig(options.config));

  const output = streams.output ?? new StdoutSink();
  const input = streams.input ?? new StdinSource({ beforeRead: () => output.flush() });

  const deadline = options.timeout === undefined ? null : Date.now() + options.timeout;
  const interpreterOptions: InterpreterOptions = {
    checkInterval: settings.checkInterval,
    logger: createLogger('interpreter'),
    ...(settings.maxTape !== undefined && { maxTape: settings.maxTape }),
    ...(options.maxSteps !== undefined && { maxSteps: options.maxSteps }),
    ...(deadline !== null && { shouldCancel: () => Date.now() >= deadline }),
  };

  let outcome: ExecutionOutcome;
  try {
    outcome = interpret(program, input, output, interpreterOptions);
  } finally {
    output.flush();
  }

  if (outcome.status === 'cancelled') {
    const why = outcome.reason === 'step-limit' ? 'step limit reached' : 'timed out';
    warn(`Execution cancelled after ${outcome.steps} steps (${why})`);
  }

  logPerformance({
    component: 'cli',
    operation: 'run',
    duration: performance.now() - started,
    metadata: { file, status: outcome.status, steps: outcome.steps },
  });
  return outcome;
}

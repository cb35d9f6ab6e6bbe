#!/usr/bin/env node
import { cac } from 'cac';
import { parseOptionalPositiveInt } from '../src/config/config-service.js';
import { TARGET_NAMES } from '../src/types.js';
import { runCommand, type RunOptions } from '../src/cli/commands/run.js';
import { transpileCommand, type TranspileOptions } from '../src/cli/commands/transpile.js';
import { compileCommand, type CompileOptions } from '../src/cli/commands/compile.js';
import { textCommand } from '../src/cli/commands/text.js';
import { checkCommand } from '../src/cli/commands/check.js';
import { handleError } from '../src/cli/utils/error-handler.js';

// 超时或步数耗尽时的退出码，与 timeout(1) 一致
const EXIT_CANCELLED = 124;

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

function intOption(flag: string, value: unknown): number | undefined {
  if (value === undefined) return undefined;
  return parseOptionalPositiveInt(flag, String(value)) ?? undefined;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function transpileOptions(options: Record<string, unknown>): TranspileOptions {
  const result: TranspileOptions = { force: Boolean(options.force) };
  const target = stringOption(options.target);
  const out = stringOption(options.out);
  const config = stringOption(options.config);
  if (target !== undefined) result.target = target;
  if (out !== undefined) result.out = out;
  if (config !== undefined) result.config = config;
  return result;
}

async function main(): Promise<void> {
  const cli = cac('brainforge');

  cli.option('--config <file>', '项目配置文件（默认 ./brainforge.config.json）');

  cli
    .command('run <file>', '解释执行程序：stdin 为程序输入，程序输出写到 stdout')
    .option('--max-tape <cells>', '纸带最大格数')
    .option('--max-steps <n>', '最多执行的指令步数')
    .option('--timeout <ms>', '墙钟超时（毫秒）')
    .action(
      wrapAction((file: string, options: Record<string, unknown>) => {
        const runOptions: RunOptions = {};
        const maxTape = intOption('--max-tape', options.maxTape);
        const maxSteps = intOption('--max-steps', options.maxSteps);
        const timeout = intOption('--timeout', options.timeout);
        const config = stringOption(options.config);
        if (maxTape !== undefined) runOptions.maxTape = maxTape;
        if (maxSteps !== undefined) runOptions.maxSteps = maxSteps;
        if (timeout !== undefined) runOptions.timeout = timeout;
        if (config !== undefined) runOptions.config = config;

        const outcome = runCommand(file, runOptions);
        if (outcome.status === 'cancelled') {
          process.exitCode = EXIT_CANCELLED;
        }
      })
    );

  cli
    .command('transpile <file>', '转译为目标语言源码（默认输出到 stdout）')
    .option('--target <target>', `目标语言：${TARGET_NAMES.join(' | ')}`)
    .option('--out <dir>', '写出可构建项目的目录')
    .option('--force', '覆盖已存在的输出目录', { default: false })
    .action(
      wrapAction((file: string, options: Record<string, unknown>) => {
        transpileCommand(file, transpileOptions(options));
      })
    );

  cli
    .command('compile <file>', '转译后调用目标工具链构建可执行文件')
    .option('--target <target>', `目标语言：${TARGET_NAMES.join(' | ')}`)
    .option('--out <dir>', '项目目录（默认 build/<程序名>）')
    .option('--force', '覆盖已存在的输出目录', { default: false })
    .action(
      wrapAction(async (file: string, options: Record<string, unknown>) => {
        const compileOptions: CompileOptions = transpileOptions(options);
        await compileCommand(file, compileOptions);
      })
    );

  cli
    .command('text <input>', '生成打印给定文本的程序')
    .option('--literal', '把参数本身当作文本而不是文件路径', { default: false })
    .action(
      wrapAction((input: string, options: Record<string, unknown>) => {
        textCommand(input, { literal: Boolean(options.literal) });
      })
    );

  cli
    .command('check <file>', '校验括号配对并输出诊断')
    .action(
      wrapAction((file: string) => {
        if (!checkCommand(file)) {
          process.exitCode = 1;
        }
      })
    );

  cli.help();
  cli.version('0.3.0');
  cli.parse(process.argv, { run: false });
  if (!cli.matchedCommand) {
    if (!cli.options.help && !cli.options.version) {
      cli.outputHelp();
      process.exitCode = 1;
    }
    return;
  }
  await cli.runMatchedCommand();
}

main().catch(handleError);

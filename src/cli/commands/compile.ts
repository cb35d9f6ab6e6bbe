import { spawn } from 'node:child_process';
import { join } from 'node:path';
import ora from 'ora';
import { emitProject } from '../../codegen/emitter.js';
import type { BuildCommand } from '../../codegen/targets/index.js';
import { DiagnosticError, Diagnostics } from '../../diagnostics/diagnostics.js';
import { programName, writeProject } from '../utils/files.js';
import { info, success } from '../utils/logger.js';
import { generateFor, type TranspileOptions } from './transpile.js';

/** --out 省略时写到 build/<程序名> */
export type CompileOptions = TranspileOptions;

/** 在 cwd 中执行外部构建命令；失败时以 C003 拒绝 */
export type ToolRunner = (command: BuildCommand, cwd: string) => Promise<void>;

const STDERR_TAIL_LINES = 20;

/**
 * 转译到 --out 目录后调用目标工具链构建。
 *
 * @returns 构建产物路径；javascript 目标无需构建，返回主源文件路径
 */
export async function compileCommand(
  file: string,
  options: CompileOptions,
  runTool: ToolRunner = spawnTool,
): Promise<string> {
  const generated = generateFor(file, options);
  const name = programName(file);
  const outDir = options.out ?? join('build', name);

  const project = emitProject(generated, name);
  writeProject(project, outDir, Boolean(options.force));

  const build = generated.target.buildCommand(name);
  if (build === null) {
    const script = join(outDir, project.mainFile);
    info(`${generated.target.name} needs no build step, run it with: node ${script}`);
    return script;
  }

  const commandLine = [build.command, ...build.args].join(' ');
  const spinner = ora(`Building ${name} with ${commandLine}`).start();
  try {
    await runTool(build, outDir);
  } catch (error) {
    spinner.fail(`${commandLine} failed`);
    throw error;
  }
  spinner.succeed(`Built ${name}`);

  const artifact = join(outDir, build.artifact);
  success(`Executable written to ${artifact}`);
  return artifact;
}

function spawnTool(build: BuildCommand, cwd: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const proc = spawn(build.command, [...build.args], { cwd, stdio: ['ignore', 'ignore', 'pipe'] });
    const stderr: string[] = [];
    proc.stderr.setEncoding('utf8');
    proc.stderr.on('data', (chunk: string) => {
      stderr.push(chunk);
    });
    proc.on('error', err => {
      reject(new DiagnosticError(Diagnostics.toolchainFailed(build.command, err.message).build()));
    });
    proc.on('close', code => {
      if (code === 0) {
        resolve();
        return;
      }
      const tail = stderr.join('').trimEnd().split('\n').slice(-STDERR_TAIL_LINES).join('\n');
      const detail = tail === '' ? `exited with code ${String(code)}` : `exited with code ${String(code)}\n${tail}`;
      reject(new DiagnosticError(Diagnostics.toolchainFailed(build.command, detail).build()));
    });
  });
}

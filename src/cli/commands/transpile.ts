import { lex } from '../../frontend/lexer.js';
import { transpile, type GeneratedSource } from '../../codegen/transpiler.js';
import { emit, emitProject, type EmittedProject } from '../../codegen/emitter.js';
import { getTarget } from '../../codegen/targets/index.js';
import { loadProjectConfig, resolveSettings } from '../../config/project-config.js';
import { programName, readSource, writeProject } from '../utils/files.js';
import { success } from '../utils/logger.js';

export interface TranspileOptions {
  target?: string;
  /** 项目输出目录；省略时把主源文件写到 stdout */
  out?: string;
  force?: boolean;
  config?: string;
}

/** 读取、校验并转译源文件，目标取自参数或配置 */
export function generateFor(file: string, options: Pick<TranspileOptions, 'target' | 'config'>): GeneratedSource {
  const project = loadProjectConfig(options.config);
  const target = options.target === undefined ? resolveSettings({}, project).target : getTarget(options.target).name;
  return transpile(lex(readSource(file)), target);
}

/**
 * 转译源文件。
 *
 * @param write - 无 --out 时接收生成的源文本
 * @returns 写入磁盘的项目；输出到 stdout 时为 null
 */
export function transpileCommand(
  file: string,
  options: TranspileOptions,
  write: (text: string) => void = text => {
    process.stdout.write(text);
  },
): EmittedProject | null {
  const generated = generateFor(file, options);

  if (options.out === undefined) {
    write(emit(generated));
    return null;
  }

  const project = emitProject(generated, programName(file));
  writeProject(project, options.out, Boolean(options.force));
  success(`Wrote ${generated.target.name} project to ${options.out}`);
  return project;
}

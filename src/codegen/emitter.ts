/**
 * @module codegen/emitter
 *
 * 把转译得到的语句行包进目标语言的样板代码，产出完整源文件或可构建项目。
 */

import type { GeneratedSource } from './transpiler.js';
import type { ProjectFile } from './targets/index.js';

/**
 * 输出完整的主源文件文本（以换行结尾）。
 */
export function emit(generated: GeneratedSource): string {
  const { target, lines } = generated;
  const base = target.indentUnit.repeat(target.bodyDepth);
  const body = lines.map(line => base + line);
  return [...target.preamble, ...body, ...target.epilogue].join('\n') + '\n';
}

export interface EmittedProject {
  readonly name: string;
  /** 主源文件在项目中的路径 */
  readonly mainFile: string;
  readonly files: readonly ProjectFile[];
}

/**
 * 输出目标语言的可构建项目（Cargo 项目、单个 C 文件或 Node 脚本）。
 */
export function emitProject(generated: GeneratedSource, name: string): EmittedProject {
  const { target } = generated;
  return {
    name,
    mainFile: target.mainFile,
    files: target.projectFiles(name, emit(generated)),
  };
}

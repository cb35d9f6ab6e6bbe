import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { DiagnosticError, Diagnostics } from '../../diagnostics/diagnostics.js';
import type { EmittedProject } from '../../codegen/emitter.js';

/** 以字节读取源文件，交由词法分析器按 UTF-8 解码 */
export function readSource(file: string): Uint8Array {
  return new Uint8Array(readFileSync(file));
}

/** 去掉目录与扩展名后的文件名，用作生成项目的名称 */
export function programName(file: string): string {
  return basename(file, extname(file));
}

/**
 * 把生成的项目写入目录。
 *
 * @throws {DiagnosticError} C002 目录已存在且未指定 force
 */
export function writeProject(project: EmittedProject, outDir: string, force: boolean): void {
  if (existsSync(outDir)) {
    if (!force) {
      throw new DiagnosticError(Diagnostics.outputExists(outDir).build());
    }
    rmSync(outDir, { recursive: true, force: true });
  }
  for (const file of project.files) {
    const target = join(outDir, ...file.path.split('/'));
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, file.contents, 'utf8');
  }
}

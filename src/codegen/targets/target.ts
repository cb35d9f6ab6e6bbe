import type { OpKind, TargetName } from '../../types.js';

/** 直接翻译为单条语句的指令（循环括号另行处理） */
export type StatementOp = Exclude<OpKind, OpKind.LoopOpen | OpKind.LoopClose>;

export interface ProjectFile {
  /** 相对于项目根目录的路径，使用 `/` 分隔 */
  readonly path: string;
  readonly contents: string;
}

export interface BuildCommand {
  readonly command: string;
  readonly args: readonly string[];
  /** 构建产物路径（相对于项目根目录） */
  readonly artifact: string;
}

/**
 * 一种目标语言的代码生成描述。
 *
 * 语句、循环块与样板代码都是纯文本；目标本身不做任何决策。
 * 所有目标遵循同一协议：stdin 逐字节输入、EOF 时保持当前格不变，
 * stdout 逐字节输出，指针越过第 0 格时把已缓冲的输出刷出后以状态码 1 退出。
 */
export interface CodegenTarget {
  readonly name: TargetName;
  /** 主源文件名 */
  readonly mainFile: string;
  readonly indentUnit: string;
  /** 语句在 main 函数体内的基础缩进层级 */
  readonly bodyDepth: number;
  readonly statements: Readonly<Record<StatementOp, string>>;
  readonly loopOpen: string;
  readonly loopClose: string;
  readonly preamble: readonly string[];
  readonly epilogue: readonly string[];
  /** 可构建项目的全部文件；mainSource 为 emit() 的结果 */
  projectFiles(name: string, mainSource: string): readonly ProjectFile[];
  /** 外部工具链的构建命令；无需构建的目标返回 null */
  buildCommand(name: string): BuildCommand | null;
}

export const GENERATED_BANNER = 'Generated by brainforge. Do not edit.';

/**
 * 把任意文件名规整为合法的包 / 可执行文件名。
 */
export function sanitizeProgramName(raw: string): string {
  const cleaned = raw
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, '_')
    .replace(/^_+|_+$/g, '');
  if (cleaned === '') return 'program';
  return /^[a-z]/.test(cleaned) ? cleaned : `bf_${cleaned}`;
}

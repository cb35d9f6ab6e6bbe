import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { DiagnosticCode, DiagnosticError } from '../../diagnostics/diagnostics.js';
import { error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'syntax' | 'runtime' | 'codegen' | 'text' | 'config' | 'output' | 'toolchain' | 'unknown';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function classify(code: DiagnosticCode): CliErrorCategory {
  if (code === DiagnosticCode.C002_OutputExists) return 'output';
  if (code === DiagnosticCode.C003_ToolchainFailed) return 'toolchain';
  if (code.startsWith('L')) return 'syntax';
  if (code.startsWith('E')) return 'runtime';
  if (code.startsWith('T')) return 'codegen';
  if (code.startsWith('G')) return 'text';
  if (code.startsWith('C')) return 'config';
  return 'unknown';
}

function hintFor(code: DiagnosticCode): string | null {
  switch (classify(code)) {
    case 'syntax':
      return '括号不匹配，可先运行 brainforge check <file> 查看源码位置';
    case 'runtime':
      return '程序运行期出错，已产生的输出保持不变';
    case 'codegen':
      return '代码生成失败，请确认 --target 取值为 rust、c 或 javascript';
    case 'text':
      return 'text 命令只接受 ASCII 文本';
    case 'config':
      return '请检查 brainforge.config.json 与 BRAINFORGE_* 环境变量';
    case 'output':
      return '目标目录已存在，可加 --force 覆盖';
    case 'toolchain':
      return '请确认 cargo 或 cc 已安装并位于 PATH 中';
    default:
      return null;
  }
}

function printDiagnostic(diag: Diagnostic): void {
  logError(`[${diag.code}] ${diag.message}`);
  const hint = hintFor(diag.code);
  if (hint) {
    logWarn(hint);
  }
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`文件权限不足：${error.message}`);
      break;
    case 'ENOENT':
      logError(`未找到目标文件：${error.message}`);
      break;
    case 'EISDIR':
      logError(`目标是目录而不是文件：${error.message}`);
      break;
    case 'EPIPE':
      logError(`输出管道已关闭：${error.message}`);
      break;
    default:
      logError(`文件系统错误(${code})：${error.message}`);
      break;
  }
}

export function handleError(error: unknown): void {
  if (error instanceof DiagnosticError) {
    printDiagnostic(error.diagnostic);
    process.exit(1);
  }

  if (isNodeError(error)) {
    handleNodeError(error);
    process.exit(1);
  }

  if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('发生未知错误，请重试');
  }

  process.exit(1);
}

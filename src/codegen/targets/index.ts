import { TARGET_NAMES, isTargetName, type TargetName } from '../../types.js';
import { DiagnosticError, Diagnostics } from '../../diagnostics/diagnostics.js';
import { cTarget } from './c.js';
import { javascriptTarget } from './javascript.js';
import { rustTarget } from './rust.js';
import type { CodegenTarget } from './target.js';

export * from './target.js';
export { cTarget, javascriptTarget, rustTarget };

const TARGETS: Readonly<Record<TargetName, CodegenTarget>> = {
  rust: rustTarget,
  c: cTarget,
  javascript: javascriptTarget,
};

/**
 * 按名称查找目标语言。
 *
 * @throws {DiagnosticError} T003 未知目标
 */
export function getTarget(name: string): CodegenTarget {
  if (!isTargetName(name)) {
    throw new DiagnosticError(Diagnostics.unknownTarget(name, TARGET_NAMES).build());
  }
  return TARGETS[name];
}

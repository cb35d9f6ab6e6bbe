import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { handleError } from '../../../src/cli/utils/error-handler.js';
import {
  DiagnosticCode,
  DiagnosticError,
  DiagnosticSeverity,
  Diagnostics,
  type Diagnostic,
} from '../../../src/diagnostics/diagnostics.js';

class ExitSignal extends Error {
  constructor(readonly code: number) {
    super('exit');
  }
}

const defaultSpan = {
  start: { line: 1, col: 1 },
  end: { line: 1, col: 1 },
};

function makeDiagnostic(code: DiagnosticCode, message: string): Diagnostic {
  return {
    severity: DiagnosticSeverity.Error,
    code,
    message,
    span: defaultSpan,
  };
}

describe('error-handler', { concurrency: false }, () => {
  let originalExit: typeof process.exit;
  let originalError: typeof console.error;
  let originalWarn: typeof console.warn;
  let errors: string[];
  let warnings: string[];

  function expectExit(error: unknown): void {
    try {
      handleError(error);
      assert.fail('handleError 应调用 process.exit');
    } catch (signal) {
      assert.ok(signal instanceof ExitSignal);
      assert.equal(signal.code, 1);
    }
  }

  beforeEach(() => {
    errors = [];
    warnings = [];
    originalExit = process.exit;
    originalError = console.error;
    originalWarn = console.warn;
    process.exit = ((code?: number) => {
      throw new ExitSignal(code ?? 0);
    }) as never;
    console.error = (message?: unknown) => {
      errors.push(String(message ?? ''));
    };
    console.warn = (message?: unknown) => {
      warnings.push(String(message ?? ''));
    };
  });

  afterEach(() => {
    process.exit = originalExit;
    console.error = originalError;
    console.warn = originalWarn;
  });

  it('每类诊断都输出代码、消息与提示', () => {
    const cases: Array<[DiagnosticCode, string]> = [
      [DiagnosticCode.L001_UnmatchedCloseBracket, 'brainforge check'],
      [DiagnosticCode.E001_PointerUnderflow, '已产生的输出保持不变'],
      [DiagnosticCode.T003_UnknownTarget, '--target'],
      [DiagnosticCode.G001_NonAsciiCharacter, 'ASCII'],
      [DiagnosticCode.C001_InvalidConfiguration, 'BRAINFORGE_*'],
      [DiagnosticCode.C002_OutputExists, '--force'],
      [DiagnosticCode.C003_ToolchainFailed, 'PATH'],
    ];

    for (const [code, hint] of cases) {
      errors = [];
      warnings = [];
      expectExit(new DiagnosticError(makeDiagnostic(code, `failure ${code}`)));
      assert.equal(errors.length, 1, code);
      assert.match(errors[0] ?? '', new RegExp(`\\[${code}] failure ${code}$`));
      assert.equal(warnings.length, 1, code);
      assert.ok(warnings[0]?.includes(hint), `${code} 的提示应包含 ${hint}`);
    }
  });

  it('直接处理 Diagnostics 构建的错误', () => {
    expectExit(new DiagnosticError(Diagnostics.pointerUnderflow({ line: 1, col: 3 }).build()));
    assert.equal(errors.length, 1);
    assert.match(errors[0] ?? '', /\[E001] Data pointer moved left of cell 0/);
  });

  it('处理 NodeJS 文件系统错误', () => {
    expectExit(Object.assign(new Error('not found'), { code: 'ENOENT' }));
    assert.ok(errors[0]?.includes('未找到目标文件'), '应输出缺失文件提示');
  });

  it('未知的文件系统错误码原样输出', () => {
    expectExit(Object.assign(new Error('busy'), { code: 'EBUSY' }));
    assert.ok(errors[0]?.includes('文件系统错误(EBUSY)'));
  });

  it('普通 Error 输出其消息', () => {
    expectExit(new Error('boom'));
    assert.ok(errors[0]?.endsWith(' boom'));
    assert.equal(warnings.length, 0);
  });

  it('打印普通错误信息', () => {
    expectExit('未知异常');
    assert.ok(errors[0]?.includes('未知错误'), '默认路径应输出未知错误提示');
  });
});

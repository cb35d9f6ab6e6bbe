// Structured diagnostics with error codes and spans

import type { Position, Span } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
  Hint = 'hint',
}

export enum DiagnosticCode {
  // Lexer errors (L001-L099)
  L001_UnmatchedCloseBracket = 'L001',
  L002_UnmatchedOpenBracket = 'L002',

  // Execution errors (E001-E099)
  E001_PointerUnderflow = 'E001',
  E002_TapeLimitExceeded = 'E002',

  // Transpiler errors (T001-T099)
  T001_LoopStackMismatch = 'T001',
  T002_JumpTableDivergence = 'T002',
  T003_UnknownTarget = 'T003',

  // Text generator errors (G001-G099)
  G001_NonAsciiCharacter = 'G001',

  // Configuration / CLI errors (C001-C099)
  C001_InvalidConfiguration = 'C001',
  C002_OutputExists = 'C002',
  C003_ToolchainFailed = 'C003',
}

export interface RelatedInformation {
  readonly span: Span;
  readonly message: string;
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
  readonly relatedInformation?: readonly RelatedInformation[];
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get pos(): Position {
    return this.diagnostic.span.start;
  }

  get code(): DiagnosticCode {
    return this.diagnostic.code;
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;
  private relatedInformation: RelatedInformation[] = [];

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withPosition(pos: Position): DiagnosticBuilder {
    this.span = { start: pos, end: pos };
    return this;
  }

  withRelated(span: Span, message: string): DiagnosticBuilder {
    this.relatedInformation.push({ span, message });
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    const diagnostic: Diagnostic = {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
    };

    if (this.relatedInformation.length > 0) {
      return { ...diagnostic, relatedInformation: [...this.relatedInformation] };
    }

    return diagnostic;
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  unmatchedCloseBracket: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L001_UnmatchedCloseBracket)
      .withMessage(`Unmatched ']' at line ${pos.line}, column ${pos.col}`)
      .withPosition(pos),

  unmatchedOpenBracket: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L002_UnmatchedOpenBracket)
      .withMessage(`Unmatched '[' at line ${pos.line}, column ${pos.col}`)
      .withPosition(pos),

  pointerUnderflow: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.E001_PointerUnderflow)
      .withMessage('Data pointer moved left of cell 0')
      .withPosition(pos),

  tapeLimitExceeded: (limit: number, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.E002_TapeLimitExceeded)
      .withMessage(`Tape limit of ${limit} cells exceeded`)
      .withPosition(pos),

  loopStackMismatch: (detail: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.T001_LoopStackMismatch)
      .withMessage(`Loop structure mismatch: ${detail}`)
      .withPosition(pos),

  jumpTableDivergence: (open: number, close: number, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.T002_JumpTableDivergence)
      .withMessage(`Loop closed at instruction ${close} does not match the jump table (opened at ${open})`)
      .withPosition(pos),

  unknownTarget: (name: string, known: readonly string[]): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.T003_UnknownTarget)
      .withMessage(`Unknown target '${name}', valid values: ${known.join(', ')}`)
      .withPosition(dummyPosition()),

  nonAsciiCharacter: (char: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.G001_NonAsciiCharacter)
      .withMessage(`Non-ASCII character '${char}' at line ${pos.line}, column ${pos.col}`)
      .withPosition(pos),

  invalidConfiguration: (message: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.C001_InvalidConfiguration)
      .withMessage(message)
      .withPosition(dummyPosition()),

  outputExists: (path: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.C002_OutputExists)
      .withMessage(`Output path '${path}' already exists, pass --force to overwrite it`)
      .withPosition(dummyPosition()),

  toolchainFailed: (command: string, detail: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.C003_ToolchainFailed)
      .withMessage(`'${command}' failed: ${detail}`)
      .withPosition(dummyPosition()),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, code, message, span } = diagnostic;
  const pos = `${span.start.line}:${span.start.col}`;

  let result = `${severity} ${code}: ${message} at ${pos}`;

  if (source) {
    const lines = source.split(/\r\n|\r|\n/);
    const line = lines[span.start.line - 1];
    if (line) {
      result += `\n> ${span.start.line}| ${line}`;
      result += `\n> ${' '.repeat(String(span.start.line).length)}  ${caretPadding(line, span.start.col)}^`;
    }
  }

  if (diagnostic.relatedInformation) {
    for (const related of diagnostic.relatedInformation) {
      result += `\n  note: ${related.message} at ${related.span.start.line}:${related.span.start.col}`;
    }
  }

  return result;
}

// Tabs in the excerpt stay tabs in the padding
function caretPadding(line: string, col: number): string {
  return Array.from(line)
    .slice(0, col - 1)
    .map(ch => (ch === '\t' ? '\t' : ' '))
    .join('');
}

// Utility to create a dummy position for diagnostics without source location
export function dummyPosition(): Position {
  return { line: 1, col: 1 };
}

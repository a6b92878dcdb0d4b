import type { Diagnostic, SpecField } from './types.js';

// ── Stages ───────────────────────────────────────────────────────────

export type CompileStage = 'parse' | 'validate' | 'build' | 'emit';

export const STAGE_EXIT_CODES: Readonly<Record<CompileStage, number>> = {
  parse: 2,
  validate: 3,
  build: 4,
  emit: 5,
};

// ── Base error ───────────────────────────────────────────────────────

export abstract class CompileError extends Error {
  abstract readonly stage: CompileStage;

  /** One-line cause, without the stage prefix */
  abstract get summary(): string;

  get exitCode(): number {
    return STAGE_EXIT_CODES[this.stage];
  }

  toJSON(): Record<string, unknown> {
    return {
      stage: this.stage,
      name: this.name,
      message: this.summary,
    };
  }
}

// ── ParseError ───────────────────────────────────────────────────────

export class ParseError extends CompileError {
  readonly stage = 'parse' as const;
  readonly field: SpecField | undefined;
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(
    cause: string,
    location: { readonly field?: SpecField; readonly line?: number; readonly column?: number } = {},
  ) {
    super(formatParseMessage(cause, location));
    this.name = 'ParseError';
    this.field = location.field;
    this.line = location.line;
    this.column = location.column;
  }

  get summary(): string {
    return this.message;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), field: this.field, line: this.line, column: this.column };
  }
}

function formatParseMessage(
  cause: string,
  location: { readonly field?: SpecField; readonly line?: number; readonly column?: number },
): string {
  const where: string[] = [];
  if (location.field) where.push(location.field);
  if (location.line !== undefined) {
    where.push(location.column !== undefined
      ? `(line ${location.line}, column ${location.column})`
      : `(line ${location.line})`);
  }
  return where.length > 0 ? `${where.join(' ')}: ${cause}` : cause;
}

// ── SchemaError ──────────────────────────────────────────────────────

export class SchemaError extends CompileError {
  readonly stage = 'validate' as const;
  readonly issues: readonly Diagnostic[];

  constructor(issues: readonly Diagnostic[]) {
    super(
      `Schema validation failed with ${issues.length} error(s):\n` +
        issues.map((i) => `  - ${formatIssue(i)}`).join('\n'),
    );
    this.name = 'SchemaError';
    this.issues = issues;
  }

  get summary(): string {
    const count = this.issues.length === 1 ? '1 problem' : `${this.issues.length} problems`;
    return `${count}: ${this.issues.map(formatIssue).join('; ')}`;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues };
  }
}

export function formatIssue(issue: Diagnostic): string {
  const where = issue.field
    ? issue.line !== undefined ? `${issue.field} (line ${issue.line}): ` : `${issue.field}: `
    : '';
  return `${where}${issue.message}`;
}

// ── BuildError ───────────────────────────────────────────────────────

export class BuildError extends CompileError {
  readonly stage = 'build' as const;
  /** The relation, attribute or clause the builder could not resolve */
  readonly subject: string;

  constructor(message: string, subject: string) {
    super(message);
    this.name = 'BuildError';
    this.subject = subject;
  }

  get summary(): string {
    return this.message;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), subject: this.subject };
  }
}

// ── EmitError ────────────────────────────────────────────────────────

export class EmitError extends CompileError {
  readonly stage = 'emit' as const;
  readonly construct: string;

  constructor(message: string, construct: string) {
    super(message);
    this.name = 'EmitError';
    this.construct = construct;
  }

  get summary(): string {
    return this.message;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), construct: this.construct };
  }
}

export function isCompileError(err: unknown): err is CompileError {
  return err instanceof CompileError;
}

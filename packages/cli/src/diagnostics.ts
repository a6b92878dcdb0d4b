import pc from 'picocolors';
import { formatIssue, isCompileError, type Diagnostic } from '@phiql/compiler';

// ── CLI errors ──────────────────────────────────────────────────────

/** Failures outside the compiler: reading the spec, loading config, writing output */
export type CliStage = 'io' | 'config';

export class CliError extends Error {
  readonly exitCode = 1;

  constructor(
    readonly stage: CliStage,
    message: string,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export interface Failure {
  readonly stage: string;
  readonly cause: string;
  readonly exitCode: number;
}

/** Map any thrown value to the stage, one-line cause and exit code the CLI reports. */
export function describeFailure(err: unknown): Failure {
  if (isCompileError(err)) {
    return { stage: err.stage, cause: err.summary, exitCode: err.exitCode };
  }
  if (err instanceof CliError) {
    return { stage: err.stage, cause: err.message, exitCode: err.exitCode };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { stage: 'io', cause: message, exitCode: 1 };
}

export function formatFailure(failure: Failure): string {
  return `error[${failure.stage}] ${failure.cause.replace(/\s*\n\s*/g, ' ')}`;
}

// ── Reporting ───────────────────────────────────────────────────────

/** Print the single-line diagnostic and set the process exit code. */
export function reportFailure(err: unknown): Failure {
  const failure = describeFailure(err);
  console.error(pc.red(formatFailure(failure)));
  process.exitCode = failure.exitCode;
  return failure;
}

export function reportWarnings(warnings: readonly Diagnostic[]): void {
  for (const w of warnings) {
    console.log(pc.yellow(`  Warning: ${formatIssue(w)}`));
  }
}

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { CliError } from './diagnostics.js';

// ── Spec input ──────────────────────────────────────────────────────

export function readSpecFile(specFile: string, projectDir: string = process.cwd()): string {
  const path = resolve(projectDir, specFile);
  if (!existsSync(path)) {
    throw new CliError('io', `spec file not found: ${specFile}`);
  }
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    throw new CliError('io', `cannot read ${specFile}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

// ── Atomic writes ───────────────────────────────────────────────────

/**
 * Write `content` to a temporary file beside `target`, then rename it
 * into place. Missing parent directories are created. On failure the
 * temporary file is removed and `target` is left as it was.
 */
export function writeFileAtomic(target: string, content: string): void {
  const dir = dirname(target);
  const temp = join(dir, `.${basename(target)}.${process.pid}.tmp`);
  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(temp, content, 'utf-8');
    renameSync(temp, target);
  } catch (err) {
    removeIfPresent(temp);
    throw new CliError('io', `cannot write ${target}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function removeIfPresent(path: string): void {
  if (existsSync(path)) {
    unlinkSync(path);
  }
}

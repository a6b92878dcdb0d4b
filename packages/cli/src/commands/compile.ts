import { Command } from 'commander';
import pc from 'picocolors';
import { resolve } from 'node:path';
import { compileSpec, type CompileResult } from '@phiql/compiler';
import { resolveProjectConfig } from '../config-loader.js';
import { CliError, reportFailure, reportWarnings } from '../diagnostics.js';
import { readSpecFile, writeFileAtomic } from '../files.js';

export type OutputFormat = 'program' | 'sql' | 'plan';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['program', 'sql', 'plan'];

export interface CompileCommandOptions {
  readonly dialect?: string;
  readonly format?: string;
  readonly config?: string;
  readonly projectDir?: string;
}

// ── Command registration ────────────────────────────────────────────

export function registerCompileCommand(program: Command): void {
  program
    .command('compile')
    .argument('<spec-file>', 'Query specification to compile')
    .argument('<output-file>', 'Where to write the artifact')
    .description('Compile a specification into a query program')
    .option('-d, --dialect <dialect>', 'Target dialect (postgres, mysql, sqlite)')
    .option('-f, --format <format>', 'Artifact format (program, sql, plan)', 'program')
    .option('-c, --config <path>', 'Config file (default: phiql.config.ts)')
    .action(async (specFile: string, outputFile: string, opts: CompileCommandOptions) => {
      await runCompile(specFile, outputFile, opts);
    });
}

// ── Compile logic ───────────────────────────────────────────────────

/**
 * Compile `specFile` and write the artifact to `outputFile`. On failure
 * prints one `error[<stage>]` line, sets the exit code, writes nothing
 * and returns null.
 */
export async function runCompile(
  specFile: string,
  outputFile: string,
  opts: CompileCommandOptions = {},
): Promise<CompileResult | null> {
  const projectDir = opts.projectDir ?? process.cwd();

  try {
    const format = parseFormat(opts.format);
    const config = await resolveProjectConfig(projectDir, opts);
    const source = readSpecFile(specFile, projectDir);

    const result = compileSpec(source, config);
    reportWarnings(result.warnings);

    writeFileAtomic(resolve(projectDir, outputFile), renderArtifact(result, format));

    console.log(
      `${pc.green('Compiled')} ${pc.cyan(specFile)} ${pc.dim(`→ ${outputFile} (${result.artifact.dialect}, ${format})`)}`,
    );
    return result;
  } catch (err) {
    reportFailure(err);
    return null;
  }
}

// ── Artifact formats ────────────────────────────────────────────────

export function renderArtifact(result: CompileResult, format: OutputFormat): string {
  const { artifact } = result;
  switch (format) {
    case 'program':
      return artifact.program;
    case 'sql': {
      const params = artifact.params.length > 0 ? `-- params: ${JSON.stringify(artifact.params)}\n` : '';
      return `${artifact.sql};\n${params}`;
    }
    case 'plan':
      return JSON.stringify(
        {
          dialect: artifact.dialect,
          sql: artifact.sql,
          params: artifact.params,
          columns: artifact.columns,
          tree: result.tree,
        },
        null,
        2,
      ) + '\n';
  }
}

function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined) return 'program';
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new CliError('config', `unknown format '${value}' (expected one of ${OUTPUT_FORMATS.join(', ')})`);
  }
  return format;
}

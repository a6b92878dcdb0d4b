import { Command } from 'commander';
import pc from 'picocolors';
import { compileSpec, type CompileResult } from '@phiql/compiler';
import { resolveProjectConfig } from '../config-loader.js';
import { reportFailure, reportWarnings } from '../diagnostics.js';
import { readSpecFile } from '../files.js';

export interface CheckCommandOptions {
  readonly dialect?: string;
  readonly config?: string;
  readonly projectDir?: string;
}

// ── Command registration ────────────────────────────────────────────

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .argument('<spec-file>', 'Query specification to check')
    .description('Parse, validate and build a specification without writing anything')
    .option('-d, --dialect <dialect>', 'Target dialect (postgres, mysql, sqlite)')
    .option('-c, --config <path>', 'Config file (default: phiql.config.ts)')
    .action(async (specFile: string, opts: CheckCommandOptions) => {
      await runCheck(specFile, opts);
    });
}

// ── Check logic ─────────────────────────────────────────────────────

export async function runCheck(
  specFile: string,
  opts: CheckCommandOptions = {},
): Promise<CompileResult | null> {
  const projectDir = opts.projectDir ?? process.cwd();

  try {
    const config = await resolveProjectConfig(projectDir, opts);
    const result = compileSpec(readSpecFile(specFile, projectDir), config);

    reportWarnings(result.warnings);
    const { spec } = result;
    console.log(
      `${pc.green('OK')} ${pc.cyan(specFile)} ${pc.dim(
        `(${spec.schema.length} attribute(s), ${spec.relations.length} relation(s), ${result.artifact.columns.length} output column(s))`,
      )}`,
    );
    return result;
  } catch (err) {
    reportFailure(err);
    return null;
  }
}

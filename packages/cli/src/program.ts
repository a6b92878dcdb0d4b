import { Command, Help } from 'commander';
import pc from 'picocolors';
import { registerCompileCommand } from './commands/compile.js';
import { registerCheckCommand } from './commands/check.js';
import { registerInspectCommand } from './commands/inspect.js';
import { registerInitCommand } from './commands/init.js';

export const VERSION = '0.1.0';

const DESCRIPTION = 'Compile relational-calculus query specifications into SQL query programs';

// ── Program setup ───────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command();

  program
    .name('phiql')
    .description(DESCRIPTION)
    .version(VERSION);

  // Styled help output
  program.configureHelp({
    helpWidth: 80,
    showGlobalOptions: false,
    styleTitle: (str: string) => pc.bold(pc.cyan(str)),
    styleUsage: (str: string) => pc.yellow(str),
    styleCommandText: (str: string) => pc.green(str),
    styleCommandDescription: (str: string) => pc.dim(str),
    styleSubcommandTerm: (str: string) => pc.green(str),
    styleSubcommandDescription: (str: string) => pc.dim(str),
    styleOptionTerm: (str: string) => pc.yellow(str),
    styleOptionDescription: (str: string) => pc.dim(str),
    styleArgumentTerm: (str: string) => pc.yellow(str),
    styleArgumentDescription: (str: string) => pc.dim(str),
    styleDescriptionText: (str: string) => pc.white(str),
    formatHelp(cmd: Command, helper: Help): string {
      const output: string = Help.prototype.formatHelp.call(this, cmd, helper);

      if (cmd.name() === 'phiql' && !cmd.parent) {
        const header = [
          '',
          `  ${pc.bold(pc.cyan('phiql'))} ${pc.dim(`v${VERSION}`)}`,
          `  ${pc.dim('spec (S, n, V, F, sigma, G) → parameterized SQL + query program')}`,
          '',
        ].join('\n');

        const lines = output.split('\n');
        const withoutDesc = lines.filter(
          (l: string) => !l.includes(DESCRIPTION),
        );
        return header + '\n' + withoutDesc.join('\n');
      }

      return output;
    },
  });

  // Register commands
  registerCompileCommand(program);
  registerCheckCommand(program);
  registerInspectCommand(program);
  registerInitCommand(program);

  return program;
}

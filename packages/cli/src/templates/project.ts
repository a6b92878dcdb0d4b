import type { DialectName } from '@phiql/compiler';
import type { ScaffoldOptions, TemplateFile } from '../commands/init.js';

const DRIVER_PACKAGES: Readonly<Record<DialectName, Record<string, string>>> = {
  postgres: { pg: '^8.13.0', 'pg-cursor': '^2.12.0' },
  mysql: { mysql2: '^3.11.0' },
  sqlite: { 'better-sqlite3': '^11.5.0' },
};

export function makePackageJson(opts: ScaffoldOptions): string {
  const pkg: Record<string, unknown> = {
    name: opts.projectName,
    version: '0.1.0',
    private: true,
    type: 'module',
    ...(opts.example
      ? {
          scripts: {
            check: 'phiql check specs/sales.phi',
            compile: 'phiql compile specs/sales.phi dist/sales.mjs',
            start: 'node dist/sales.mjs',
          },
        }
      : {}),
    dependencies: DRIVER_PACKAGES[opts.dialect],
    devDependencies: {
      '@phiql/cli': '^0.1.0',
      '@phiql/compiler': '^0.1.0',
    },
  };
  return JSON.stringify(pkg, null, 2) + '\n';
}

export function makeConfig(opts: ScaffoldOptions): string {
  return `import { defineConfig } from '@phiql/compiler';

export default defineConfig({
  dialect: '${opts.dialect}',
  envPrefix: '${opts.envPrefix}',
  defaultAggregate: 'sum',
});
`;
}

export function makeExampleSpec(): string {
  return `# Sales over 100, per customer name
S: id:int, name:text, amount:float
n: 3
V: name, sum(amount) AS total
F: sales
sigma: amount > 100
G: name
order: total DESC
`;
}

export function makeGitignore(): string {
  return `node_modules/
dist/
.env
.env.local
`;
}

export function makeEnvExample(opts: ScaffoldOptions): string {
  if (opts.dialect === 'sqlite') {
    return `${opts.envPrefix}_FILE=./data.db\n`;
  }
  const port = opts.dialect === 'postgres' ? 5432 : 3306;
  return [
    `${opts.envPrefix}_HOST=localhost`,
    `${opts.envPrefix}_PORT=${port}`,
    `${opts.envPrefix}_NAME=app`,
    `${opts.envPrefix}_USER=app`,
    `${opts.envPrefix}_PASSWORD=`,
    '',
  ].join('\n');
}

export function projectFiles(opts: ScaffoldOptions): TemplateFile[] {
  const files: TemplateFile[] = [
    { path: 'package.json', content: makePackageJson(opts) },
    { path: 'phiql.config.ts', content: makeConfig(opts) },
    { path: '.gitignore', content: makeGitignore() },
    { path: '.env.example', content: makeEnvExample(opts) },
  ];
  if (opts.example) {
    files.push({ path: 'specs/sales.phi', content: makeExampleSpec() });
  }
  return files;
}

import type { DialectName } from '../core/config.js';

// ── Driver templates ─────────────────────────────────────────────────
// Source fragments of the generated program, one set per dialect. Each
// program exports QUERY, PARAMS, COLUMNS, configFromEnv(env) and
// run(config, write), and runs itself when executed as a script.

export interface DriverTemplate {
  /** npm packages the generated program imports */
  readonly packages: readonly string[];
  /** Environment variables read by configFromEnv, without the prefix */
  readonly variables: readonly string[];
  imports(): string;
  configFromEnv(prefix: string): string;
  run(): string;
}

function requireVariables(prefix: string, names: readonly string[]): string {
  const keys = names.map((n) => `'${prefix}_${n}'`).join(', ');
  return `  const missing = [${keys}].filter((key) => !env[key]);
  if (missing.length > 0) {
    throw new Error(\`missing environment variable(s): \${missing.join(', ')}\`);
  }`;
}

function networkConfig(prefix: string, defaultPort: number): string {
  return `export function configFromEnv(env) {
${requireVariables(prefix, ['HOST', 'NAME', 'USER'])}
  return {
    host: env.${prefix}_HOST,
    port: env.${prefix}_PORT ? Number(env.${prefix}_PORT) : ${defaultPort},
    database: env.${prefix}_NAME,
    user: env.${prefix}_USER,
    password: env.${prefix}_PASSWORD ?? '',
  };
}`;
}

const postgres: DriverTemplate = {
  packages: ['pg', 'pg-cursor'],
  variables: ['HOST', 'PORT', 'NAME', 'USER', 'PASSWORD'],
  imports: () => `import pg from 'pg';
import Cursor from 'pg-cursor';`,
  configFromEnv: (prefix) => networkConfig(prefix, 5432),
  run: () => `export async function run(config, write) {
  const client = new pg.Client(config);
  await client.connect();
  let count = 0;
  try {
    const cursor = client.query(new Cursor(QUERY, PARAMS));
    for (let rows = await cursor.read(BATCH_SIZE); rows.length > 0; rows = await cursor.read(BATCH_SIZE)) {
      for (const row of rows) {
        write(JSON.stringify(row) + '\\n');
        count++;
      }
    }
    await cursor.close();
  } finally {
    await client.end();
  }
  return count;
}`,
};

const mysql: DriverTemplate = {
  packages: ['mysql2'],
  variables: ['HOST', 'PORT', 'NAME', 'USER', 'PASSWORD'],
  imports: () => `import mysql from 'mysql2';`,
  configFromEnv: (prefix) => networkConfig(prefix, 3306),
  run: () => `export async function run(config, write) {
  const connection = mysql.createConnection(config);
  let count = 0;
  try {
    for await (const row of connection.query(QUERY, PARAMS).stream({ highWaterMark: BATCH_SIZE })) {
      write(JSON.stringify(row) + '\\n');
      count++;
    }
  } finally {
    connection.end();
  }
  return count;
}`,
};

const sqlite: DriverTemplate = {
  packages: ['better-sqlite3'],
  variables: ['FILE'],
  imports: () => `import Database from 'better-sqlite3';`,
  configFromEnv: (prefix) => `export function configFromEnv(env) {
${requireVariables(prefix, ['FILE'])}
  return { filename: env.${prefix}_FILE };
}`,
  run: () => `export async function run(config, write) {
  const db = new Database(config.filename, { readonly: true, fileMustExist: true });
  let count = 0;
  try {
    for (const row of db.prepare(QUERY).iterate(...PARAMS)) {
      write(JSON.stringify(row) + '\\n');
      count++;
    }
  } finally {
    db.close();
  }
  return count;
}`,
};

export const DRIVER_TEMPLATES: Readonly<Record<DialectName, DriverTemplate>> = { postgres, mysql, sqlite };

export function mainGuard(): string {
  return `if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  run(configFromEnv(process.env), (line) => process.stdout.write(line)).catch((err) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}`;
}

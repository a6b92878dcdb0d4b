import { Command } from 'commander';
import pc from 'picocolors';
import {
  childrenOf,
  compileSpec,
  formatAggregateExpr,
  formatColumn,
  isAlwaysTrue,
  walkTree,
  type CompileResult,
  type QueryNode,
  type SortKey,
  type TreeOperand,
  type TreePredicate,
} from '@phiql/compiler';
import { resolveProjectConfig } from '../config-loader.js';
import { reportFailure } from '../diagnostics.js';
import { readSpecFile } from '../files.js';

export interface InspectCommandOptions {
  readonly json?: boolean;
  readonly graph?: boolean;
  readonly dialect?: string;
  readonly config?: string;
  readonly projectDir?: string;
}

// ── Command registration ────────────────────────────────────────────

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .argument('<spec-file>', 'Query specification to inspect')
    .description('Show the parsed specification and its query tree')
    .option('--json', 'Output as JSON')
    .option('--graph', 'Output the query tree as a Mermaid graph')
    .option('-d, --dialect <dialect>', 'Target dialect (postgres, mysql, sqlite)')
    .option('-c, --config <path>', 'Config file (default: phiql.config.ts)')
    .action(async (specFile: string, opts: InspectCommandOptions) => {
      await runInspect(specFile, opts);
    });
}

// ── Inspect logic ───────────────────────────────────────────────────

export async function runInspect(
  specFile: string,
  opts: InspectCommandOptions = {},
): Promise<string> {
  const projectDir = opts.projectDir ?? process.cwd();

  let result: CompileResult;
  try {
    const config = await resolveProjectConfig(projectDir, opts);
    result = compileSpec(readSpecFile(specFile, projectDir), config);
  } catch (err) {
    reportFailure(err);
    return '';
  }

  let output: string;
  if (opts.json) {
    output = formatJson(result);
  } else if (opts.graph) {
    output = formatMermaid(result.tree, specFile);
  } else {
    output = formatTable(result, specFile);
  }

  console.log(output);
  return output;
}

// ── Table format ────────────────────────────────────────────────────

function formatTable(result: CompileResult, specFile: string): string {
  const { spec, artifact } = result;
  const lines: string[] = [];

  lines.push('');
  lines.push(`${pc.bold('Spec:')}    ${pc.cyan(specFile)}`);
  lines.push(`${pc.bold('Dialect:')} ${artifact.dialect}`);
  lines.push('');

  lines.push(pc.bold('Relations'));
  lines.push(pc.dim('─'.repeat(40)));
  for (const binding of spec.relations) {
    lines.push(`  ${pad(binding.alias, 16)} ${binding.relation}`);
  }
  lines.push('');

  lines.push(pc.bold('Attributes'));
  lines.push(pc.dim('─'.repeat(40)));
  for (const decl of spec.schema) {
    const name = decl.qualifier ? `${decl.qualifier}.${decl.name}` : decl.name;
    lines.push(`  ${pad(name, 24)} ${pc.dim(decl.declaredType)}`);
  }
  lines.push('');

  lines.push(pc.bold('Query tree'));
  lines.push(pc.dim('─'.repeat(70)));
  lines.push(`  ${pad('ID', 12)} ${pad('Kind', 10)} Detail`);
  lines.push(pc.dim('─'.repeat(70)));
  walkTree(result.tree, (node) => {
    lines.push(`  ${pad(node.id, 12)} ${pad(node.kind, 10)} ${describeNode(node)}`);
  });
  lines.push('');

  lines.push(pc.bold('SQL'));
  lines.push(pc.dim('─'.repeat(40)));
  for (const line of artifact.sql.split('\n')) {
    lines.push(`  ${line}`);
  }
  if (artifact.params.length > 0) {
    lines.push(`  ${pc.dim(`params: ${JSON.stringify(artifact.params)}`)}`);
  }
  lines.push('');

  return lines.join('\n');
}

// ── JSON format ─────────────────────────────────────────────────────

function formatJson(result: CompileResult): string {
  const { spec, artifact } = result;
  const output = {
    dialect: artifact.dialect,
    relations: spec.relations.map((r) => ({ relation: r.relation, alias: r.alias })),
    attributes: spec.schema.map((a) => ({
      qualifier: a.qualifier ?? null,
      name: a.name,
      type: a.type,
      declaredType: a.declaredType,
    })),
    columns: artifact.columns,
    sql: artifact.sql,
    params: artifact.params,
    warnings: result.warnings.map((w) => w.message),
    tree: result.tree,
  };

  return JSON.stringify(output, null, 2);
}

// ── Mermaid format ──────────────────────────────────────────────────

function formatMermaid(tree: QueryNode, specFile: string): string {
  const lines: string[] = [];

  lines.push(`---`);
  lines.push(`title: ${specFile}`);
  lines.push(`---`);
  lines.push('graph BT');

  const edges: string[] = [];
  walkTree(tree, (node) => {
    const label = `${node.kind}: ${describeNode(node)}`.replace(/"/g, '#quot;');
    lines.push(`  ${sanitizeId(node.id)}["${label}"]:::${node.kind}`);
    for (const child of childrenOf(node)) {
      edges.push(`  ${sanitizeId(child.id)} --> ${sanitizeId(node.id)}`);
    }
  });

  lines.push('');
  lines.push(...edges);

  lines.push('');
  lines.push('  classDef scan fill:#4CAF50,color:#fff');
  lines.push('  classDef join fill:#FF9800,color:#fff');
  lines.push('  classDef filter fill:#2196F3,color:#fff');
  lines.push('  classDef group fill:#9C27B0,color:#fff');
  lines.push('  classDef project fill:#F44336,color:#fff');
  lines.push('  classDef sort fill:#9E9E9E,color:#fff');
  lines.push('  classDef limit fill:#9E9E9E,color:#fff');

  return lines.join('\n');
}

// ── Node descriptions ───────────────────────────────────────────────

export function describeNode(node: QueryNode): string {
  switch (node.kind) {
    case 'scan':
      return node.alias === node.relation ? node.relation : `${node.relation} AS ${node.alias}`;
    case 'join':
      return node.conditions.map((c) => `${formatColumn(c.left)} = ${formatColumn(c.right)}`).join(' AND ');
    case 'filter':
      return describePredicate(node.predicate);
    case 'group': {
      const keys = node.keys.length > 0 ? `by ${node.keys.map(formatColumn).join(', ')}` : 'all rows';
      return isAlwaysTrue(node.having) ? keys : `${keys} having ${describePredicate(node.having)}`;
    }
    case 'project':
      return node.columns.map((c) => c.name).join(', ');
    case 'sort':
      return node.keys.map(describeSortKey).join(', ');
    case 'limit':
      return String(node.count);
  }
}

function describeOperand(operand: TreeOperand): string {
  switch (operand.kind) {
    case 'column': return formatColumn(operand);
    case 'aggregate': return formatAggregateExpr(operand);
    case 'literal': return JSON.stringify(operand.value);
  }
}

function describePredicate(predicate: TreePredicate): string {
  switch (predicate.kind) {
    case 'and':
    case 'or': {
      if (predicate.operands.length === 0) return predicate.kind === 'and' ? 'true' : 'false';
      const joiner = predicate.kind === 'and' ? ' and ' : ' or ';
      return predicate.operands
        .map((p) => (p.kind === 'and' || p.kind === 'or' ? `(${describePredicate(p)})` : describePredicate(p)))
        .join(joiner);
    }
    case 'not':
      return `not ${predicate.operand.kind === 'comparison' ? describePredicate(predicate.operand) : `(${describePredicate(predicate.operand)})`}`;
    case 'comparison':
      return `${describeOperand(predicate.left)} ${predicate.op} ${describeOperand(predicate.right)}`;
  }
}

function describeSortKey(key: SortKey): string {
  const expression = key.expression;
  const text = expression.kind === 'output'
    ? expression.name
    : expression.kind === 'column' ? formatColumn(expression) : formatAggregateExpr(expression);
  return `${text} ${key.direction}`;
}

// ── Utilities ───────────────────────────────────────────────────────

function pad(str: string, width: number): string {
  return str.padEnd(width);
}

function sanitizeId(id: string): string {
  return id.replace(/[^a-zA-Z0-9_]/g, '_');
}

import type { AttributeDecl, AttributeRef, AttributeType, RelationBinding } from '../core/types.js';
import { formatRef } from '../core/types.js';

// ── Resolved attributes ──────────────────────────────────────────────

export interface ResolvedAttribute {
  readonly alias: string;
  readonly name: string;
  readonly type: AttributeType;
}

export type Resolution =
  | { readonly ok: true; readonly attribute: ResolvedAttribute }
  | { readonly ok: false; readonly code: 'unknown-alias' | 'unknown-attribute'; readonly message: string };

// ── AttributeScope ───────────────────────────────────────────────────

/**
 * Name resolution over S and F. An unqualified declaration in S belongs
 * to the only relation of F; with several relations it has no owner and
 * is left out of the scope. An unqualified reference to a name declared
 * by several relations (a natural-join key) resolves to the first of
 * them in F order.
 */
export class AttributeScope {
  private readonly aliasOrder: Map<string, number> = new Map();
  private readonly byName: Map<string, ResolvedAttribute[]> = new Map();
  private readonly declared: ResolvedAttribute[] = [];

  constructor(
    schema: readonly AttributeDecl[],
    readonly relations: readonly RelationBinding[],
  ) {
    relations.forEach((r, index) => {
      if (!this.aliasOrder.has(r.alias)) this.aliasOrder.set(r.alias, index);
    });

    for (const decl of schema) {
      const alias = this.ownerOf(decl);
      if (alias === undefined || !this.aliasOrder.has(alias)) continue;

      const entries = this.byName.get(decl.name) ?? [];
      if (entries.some((e) => e.alias === alias)) continue;
      const attribute: ResolvedAttribute = { alias, name: decl.name, type: decl.type };
      entries.push(attribute);
      this.byName.set(decl.name, entries);
      this.declared.push(attribute);
    }

    for (const entries of this.byName.values()) {
      entries.sort((a, b) => this.aliasIndex(a.alias) - this.aliasIndex(b.alias));
    }
  }

  /** Alias owning an S declaration, or undefined when it cannot be decided */
  ownerOf(decl: AttributeDecl): string | undefined {
    if (decl.qualifier !== undefined) return decl.qualifier;
    const [only, ...rest] = this.relations;
    return only !== undefined && rest.length === 0 ? only.alias : undefined;
  }

  hasAlias(alias: string): boolean {
    return this.aliasOrder.has(alias);
  }

  aliasIndex(alias: string): number {
    return this.aliasOrder.get(alias) ?? Number.MAX_SAFE_INTEGER;
  }

  /** Every resolvable declaration, in S order */
  allAttributes(): readonly ResolvedAttribute[] {
    return this.declared;
  }

  /** Every attribute declared under one alias, in S order */
  attributesOf(alias: string): ResolvedAttribute[] {
    return this.declared.filter((a) => a.alias === alias);
  }

  /** All declarations sharing a name, ordered by F position */
  declarationsOf(name: string): readonly ResolvedAttribute[] {
    return this.byName.get(name) ?? [];
  }

  resolve(ref: AttributeRef): Resolution {
    if (ref.qualifier !== undefined) {
      if (!this.hasAlias(ref.qualifier)) {
        return {
          ok: false,
          code: 'unknown-alias',
          message: `'${formatRef(ref)}' uses alias '${ref.qualifier}', which F does not declare`,
        };
      }
      const match = this.declarationsOf(ref.name).find((e) => e.alias === ref.qualifier);
      if (!match) {
        return {
          ok: false,
          code: 'unknown-attribute',
          message: `attribute '${formatRef(ref)}' is not declared in S`,
        };
      }
      return { ok: true, attribute: match };
    }

    const [first] = this.declarationsOf(ref.name);
    if (!first) {
      return {
        ok: false,
        code: 'unknown-attribute',
        message: `attribute '${ref.name}' is not declared in S`,
      };
    }
    return { ok: true, attribute: first };
  }
}

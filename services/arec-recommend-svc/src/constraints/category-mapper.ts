import { z } from 'zod';

import defaultAliases from './category-aliases.json';

const aliasTableSchema = z.record(z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]));

export type AliasTable = z.infer<typeof aliasTableSchema>;

interface CompiledAlias {
  alias: string;
  tags: string[];
  pattern: RegExp;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface CategoryMapperOptions {
  maxRequestedCategories: number;
  aliases?: AliasTable;
}

/**
 * Maps query words and phrases to canonical category tags through an alias table.
 * Longer aliases win over the shorter aliases they contain.
 */
export class CategoryMapper {
  private readonly compiled: CompiledAlias[];
  private readonly maxRequestedCategories: number;
  private readonly tags: string[];

  constructor(options: CategoryMapperOptions) {
    const table = aliasTableSchema.parse(options.aliases ?? defaultAliases);
    this.maxRequestedCategories = options.maxRequestedCategories;
    this.compiled = Object.entries(table)
      .map(([alias, target]) => {
        const normalized = alias.trim().toLowerCase();
        return {
          alias: normalized,
          tags: [...new Set(typeof target === 'string' ? [target] : target)],
          pattern: new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(normalized)}(?![\\p{L}\\p{N}])`, 'gu')
        };
      })
      .sort((a, b) => b.alias.length - a.alias.length);

    this.tags = [...new Set(this.compiled.flatMap((entry) => (entry.tags.length === 1 ? entry.tags : [])))].sort();
  }

  /** Every tag an unambiguous alias can produce. */
  knownTags(): string[] {
    return [...this.tags];
  }

  /**
   * Tags requested by `query`, in order of first mention. Aliases naming several tags are
   * ignored. Tags outside a non-empty `vocabulary` are dropped. When more than
   * `maxRequestedCategories` remain, the request is too broad to act on and the result is empty.
   */
  map(query: string, vocabulary: readonly string[] = []): string[] {
    let text = query.toLowerCase().replace(/\s+/g, ' ');
    const found: Array<{ tag: string; position: number }> = [];

    for (const entry of this.compiled) {
      text = text.replace(entry.pattern, (match: string, position: number) => {
        if (entry.tags.length === 1) {
          found.push({ tag: entry.tags[0], position });
        }
        return ' '.repeat(match.length);
      });
    }

    const allowed = vocabulary.length > 0 ? new Set(vocabulary) : null;
    const tags = [
      ...new Set(
        found
          .sort((a, b) => a.position - b.position)
          .map((entry) => entry.tag)
          .filter((tag) => !allowed || allowed.has(tag))
      )
    ];

    return tags.length > this.maxRequestedCategories ? [] : tags;
  }
}

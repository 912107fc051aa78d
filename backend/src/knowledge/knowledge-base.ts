import { z } from 'zod';
import guides from './data/network-guides.json';
import type { KnowledgeEntry } from './knowledge.types.js';

export const knowledgeEntrySchema = z.object({
  trigger: z.string().trim().min(1, 'trigger is required'),
  aliases: z.array(z.string().trim().min(1)).default([]),
  title: z.string().trim().min(1, 'title is required'),
  document: z.string().trim().min(1, 'document is required'),
});

export const knowledgeEntriesSchema = z.array(knowledgeEntrySchema);

export type KnowledgeEntryInput = z.input<typeof knowledgeEntrySchema>;

/**
 * 只读的触发短语 → 排障文档表。条目顺序即匹配顺序。
 */
export class KnowledgeBase {
  private readonly entries: readonly KnowledgeEntry[];

  private constructor(entries: KnowledgeEntry[]) {
    this.entries = Object.freeze(entries.map((entry) => Object.freeze(entry)));
  }

  static fromEntries(input: unknown): KnowledgeBase {
    const parsed = knowledgeEntriesSchema.parse(input);
    const seen = new Set<string>();

    for (const entry of parsed) {
      for (const phrase of [entry.trigger, ...entry.aliases]) {
        const normalized = phrase.toLowerCase();
        if (seen.has(normalized)) {
          throw new Error(`Duplicate knowledge trigger: "${phrase}"`);
        }
        seen.add(normalized);
      }
    }

    return new KnowledgeBase(
      parsed.map((entry) => ({
        ...entry,
        aliases: Object.freeze([...entry.aliases]),
      })),
    );
  }

  static networkGuides(): KnowledgeBase {
    return KnowledgeBase.fromEntries(guides);
  }

  get size(): number {
    return this.entries.length;
  }

  list(): readonly KnowledgeEntry[] {
    return this.entries;
  }
}

import type { CorpusItem } from '../../domain/entities/CorpusItem.js';
import type { Outcome } from '../../domain/value-objects/Outcome.js';
import type { LexicalResult, ScoredItem } from '../../application/dto/SearchResults.js';

export type OutputFormat = 'json' | 'text';
export type DetailLevel = 'brief' | 'normal' | 'full';

const PREVIEW_CHARS = 200;

function preview(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > PREVIEW_CHARS ? `${flat.slice(0, PREVIEW_CHARS)}…` : flat;
}

/**
 * 漸進式揭露格式化器：根據 level 控制輸出細節
 *
 * - brief：僅 identifier + score
 * - normal：再加上文字預覽（預設）
 * - full：完整 text
 */
export class ProgressiveDisclosureFormatter {
  formatScored(results: ScoredItem[], format: OutputFormat, level: DetailLevel = 'normal'): string {
    if (format === 'json') {
      return JSON.stringify(
        results.map((r) => (level === 'brief' ? { identifier: r.identifier, score: r.score } : r)),
        null,
        2,
      );
    }
    if (results.length === 0) return 'No results found.';

    return results
      .map((r, i) => {
        const header = `[${i + 1}] ${r.identifier} (score: ${r.score.toFixed(4)})`;
        if (level === 'brief') return header;
        const body = level === 'full' ? r.text : preview(r.text);
        return `${header}\n${body.split('\n').map((l) => `    ${l}`).join('\n')}`;
      })
      .join('\n\n');
  }

  formatLexical(results: LexicalResult[], format: OutputFormat): string {
    if (format === 'json') return JSON.stringify(results, null, 2);
    if (results.length === 0) return 'No results found.';

    return results
      .map((r, i) => `[${i + 1}] ${r.identifier} (rank: ${r.rank.toFixed(4)})\n    ${r.snippet}`)
      .join('\n\n');
  }

  /** review 的 org-mode 輸出：每筆一個 heading，帶 CITED_BY_COUNT 屬性 */
  formatReview(items: CorpusItem[], format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(items.map(({ identifier, metadata, addedAt }) => ({ identifier, metadata, addedAt })), null, 2);
    }

    return items
      .map((item) => {
        const title = item.metadata.title ?? item.identifier;
        const lines = [
          `* ${title}`,
          ':PROPERTIES:',
          `:IDENTIFIER: ${item.identifier}`,
        ];
        if (item.metadata.citedByCount !== undefined) {
          lines.push(`:CITED_BY_COUNT: ${item.metadata.citedByCount}`);
        }
        lines.push(':END:', '', item.metadata.citation ?? preview(item.text));
        return lines.join('\n');
      })
      .join('\n\n');
  }

  formatOutcomes(outcomes: Outcome[], format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(
        outcomes.map((o) => (o.kind === 'failed'
          ? { kind: o.kind, identifier: o.identifier, code: o.error.code, message: o.error.message }
          : o)),
        null,
        2,
      );
    }

    return outcomes
      .map((o) => {
        switch (o.kind) {
          case 'inserted': return `Added ${o.identifier}`;
          case 'updated': return `Updated ${o.identifier}${o.reembedded ? ' (re-embedded)' : ''}`;
          case 'skipped': return `Skipped ${o.identifier} (${o.reason})`;
          case 'failed': return `Failed ${o.identifier}: [${o.error.code}] ${o.error.message}`;
        }
      })
      .join('\n');
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]: [string, unknown]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}

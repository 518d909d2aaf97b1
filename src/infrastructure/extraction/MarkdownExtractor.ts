import matter from 'gray-matter';
import { z } from 'zod';
import type { Extraction, ExtractorPort } from '../../domain/ports/ExtractorPort.js';
import type { ItemMetadata } from '../../domain/entities/ItemMetadata.js';

export interface ParsedMarkdown {
  frontmatter: Record<string, unknown>;
  body: string;
}

export function parseMarkdown(rawMarkdown: string): ParsedMarkdown {
  if (!rawMarkdown.trim()) {
    return { frontmatter: {}, body: '' };
  }
  const { data, content } = matter(rawMarkdown);
  return { frontmatter: data, body: content };
}

export class MarkdownExtractor implements ExtractorPort {
  readonly name = 'markdown';
  readonly extensions = ['.md', '.markdown'] as const;

  async extract(_filePath: string, bytes: Buffer): Promise<Extraction> {
    const { frontmatter, body } = parseMarkdown(bytes.toString('utf-8'));

    const metadata: ItemMetadata = { extractor: this.name };
    if (Object.keys(frontmatter).length > 0) {
      // YAML 日期會被解析成 Date，先轉成 JSON 相容的值
      metadata.frontmatter = z.record(z.unknown()).parse(JSON.parse(JSON.stringify(frontmatter)));
      const title = frontmatter.title;
      if (typeof title === 'string' && title.trim()) metadata.title = title.trim();
    }

    return { text: body, metadata };
  }
}

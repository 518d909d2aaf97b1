import { z } from 'zod';
import type { Extraction, ExtractorPort } from '../../domain/ports/ExtractorPort.js';

/** nbformat 的 source / text 可以是字串或逐行陣列 */
const MultilineSchema = z.union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value.join('') : value));

const OutputSchema = z.object({
  output_type: z.string(),
  text: MultilineSchema.optional(),
  data: z.record(z.unknown()).optional(),
}).passthrough();

const CellSchema = z.object({
  cell_type: z.enum(['markdown', 'code', 'raw']),
  source: MultilineSchema,
  outputs: z.array(OutputSchema).optional(),
}).passthrough();

export const NotebookSchema = z.object({
  nbformat: z.number().int().min(4),
  metadata: z.object({
    kernelspec: z.object({ language: z.string().optional() }).passthrough().optional(),
    language_info: z.object({ name: z.string().optional() }).passthrough().optional(),
  }).passthrough().default({}),
  cells: z.array(CellSchema),
});

export type Notebook = z.infer<typeof NotebookSchema>;

function outputText(output: z.infer<typeof OutputSchema>): string | undefined {
  if (output.text !== undefined) return output.text;
  const plain = output.data?.['text/plain'];
  if (typeof plain === 'string') return plain;
  if (Array.isArray(plain) && plain.every((line) => typeof line === 'string')) return plain.join('');
  return undefined;
}

/**
 * 將 notebook 轉成 markdown：markdown cell 原樣，
 * code cell 以 kernel 語言 fence，文字輸出另開 fence
 */
export function notebookToMarkdown(notebook: Notebook): string {
  const language = notebook.metadata.kernelspec?.language
    ?? notebook.metadata.language_info?.name
    ?? '';

  const blocks: string[] = [];
  for (const cell of notebook.cells) {
    if (!cell.source.trim()) continue;
    switch (cell.cell_type) {
      case 'markdown':
      case 'raw':
        blocks.push(cell.source.trim());
        break;
      case 'code': {
        blocks.push('```' + language + '\n' + cell.source.trimEnd() + '\n```');
        for (const output of cell.outputs ?? []) {
          const text = outputText(output);
          if (text?.trim()) blocks.push('```\n' + text.trimEnd() + '\n```');
        }
        break;
      }
    }
  }
  return blocks.join('\n\n');
}

export class NotebookExtractor implements ExtractorPort {
  readonly name = 'notebook';
  readonly extensions = ['.ipynb'] as const;

  async extract(_filePath: string, bytes: Buffer): Promise<Extraction> {
    const notebook = NotebookSchema.parse(JSON.parse(bytes.toString('utf-8')));
    return {
      text: notebookToMarkdown(notebook),
      metadata: { extractor: this.name, cellCount: notebook.cells.length },
    };
  }
}

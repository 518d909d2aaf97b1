import type { BibtexEntry } from '../../domain/entities/ItemMetadata.js';

const IGNORED_TYPES = new Set(['comment', 'string', 'preamble']);

/**
 * 解析 BibTeX 檔案
 * 格式：
 *   @article{key,
 *     title = {Value with {nested} braces},
 *     year = 2020,
 *     journal = "Quoted value",
 *   }
 * @comment / @string / @preamble 略過；欄位名轉小寫
 */
export class BibtexParser {
  parse(content: string): BibtexEntry[] {
    const entries: BibtexEntry[] = [];
    let pos = 0;

    while (pos < content.length) {
      const at = content.indexOf('@', pos);
      if (at === -1) break;

      const header = /^@(\w+)\s*([{(])/.exec(content.slice(at));
      if (!header) {
        pos = at + 1;
        continue;
      }
      const type = header[1].toLowerCase();
      const bodyStart = at + header[0].length;
      const bodyEnd = this.findClosing(content, bodyStart - 1);
      if (bodyEnd === -1) break;

      if (!IGNORED_TYPES.has(type)) {
        const entry = this.parseBody(type, content.slice(bodyStart, bodyEnd));
        if (entry) entries.push(entry);
      }
      pos = bodyEnd + 1;
    }

    return entries;
  }

  /** 從開括號位置找出對應的閉括號，支援巢狀 */
  private findClosing(content: string, openIndex: number): number {
    const open = content[openIndex];
    const close = open === '(' ? ')' : '}';
    let depth = 0;
    for (let i = openIndex; i < content.length; i++) {
      const ch = content[i];
      if (ch === open) depth++;
      else if (ch === close) {
        depth--;
        if (depth === 0) return i;
      }
    }
    return -1;
  }

  private parseBody(type: string, body: string): BibtexEntry | null {
    const comma = body.indexOf(',');
    const key = (comma === -1 ? body : body.slice(0, comma)).trim();
    if (!key) return null;

    const fields: Record<string, string> = {};
    let rest = comma === -1 ? '' : body.slice(comma + 1);

    while (rest.trim()) {
      const nameMatch = /^\s*([\w\-:.]+)\s*=\s*/.exec(rest);
      if (!nameMatch) break;
      const name = nameMatch[1].toLowerCase();
      rest = rest.slice(nameMatch[0].length);

      const { value, remaining } = this.readValue(rest);
      fields[name] = value.replace(/\s+/g, ' ').trim();
      rest = remaining.replace(/^\s*,/, '');
    }

    return { type, key, fields };
  }

  /** 讀取 {…}、"…" 或裸值（數字、macro），支援 # 串接 */
  private readValue(input: string): { value: string; remaining: string } {
    const parts: string[] = [];
    let rest = input;

    for (;;) {
      rest = rest.trimStart();
      if (rest.startsWith('{')) {
        const end = this.findClosing(rest, 0);
        if (end === -1) return { value: parts.join('') + rest.slice(1), remaining: '' };
        parts.push(rest.slice(1, end));
        rest = rest.slice(end + 1);
      } else if (rest.startsWith('"')) {
        let end = 1;
        let depth = 0;
        while (end < rest.length && !(rest[end] === '"' && depth === 0)) {
          if (rest[end] === '{') depth++;
          else if (rest[end] === '}') depth--;
          end++;
        }
        parts.push(rest.slice(1, end));
        rest = rest.slice(end + 1);
      } else {
        const bare = /^[^,#}\s]+/.exec(rest);
        if (!bare) break;
        parts.push(bare[0]);
        rest = rest.slice(bare[0].length);
      }

      const concat = /^\s*#/.exec(rest);
      if (!concat) break;
      rest = rest.slice(concat[0].length);
    }

    return { value: parts.join(''), remaining: rest };
  }
}

/** 移除 LaTeX 分組大括號，保留內容 */
export function stripBraces(value: string): string {
  return value.replace(/[{}]/g, '');
}

/** 將條目輸出回 BibTeX 文字 */
export function formatBibtexEntry(entry: BibtexEntry): string {
  const lines = Object.entries(entry.fields).map(([name, value]) => `  ${name} = {${value}},`);
  return `@${entry.type}{${entry.key},\n${lines.join('\n')}\n}`;
}

import JSZip from 'jszip';
import type { Extraction, ExtractorPort } from '../../domain/ports/ExtractorPort.js';

const SLIDE_PATH = /^ppt\/slides\/slide(\d+)\.xml$/;
const TEXT_RUN = /<a:t>([^<]*)<\/a:t>/g;

function decodeXmlEntities(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
    .replace(/&amp;/g, '&');
}

function slideNumber(name: string): number {
  const match = SLIDE_PATH.exec(name);
  return match ? Number(match[1]) : Number.MAX_SAFE_INTEGER;
}

/**
 * pptx 是 zip：每張投影片一個 ppt/slides/slideN.xml，
 * 文字在 <a:t> run 裡；依投影片編號排序，每張投影片一行
 */
export class PptxExtractor implements ExtractorPort {
  readonly name = 'pptx';
  readonly extensions = ['.pptx'] as const;

  async extract(_filePath: string, bytes: Buffer): Promise<Extraction> {
    const zip = await JSZip.loadAsync(bytes);
    const slides = zip.file(SLIDE_PATH)
      .sort((a, b) => slideNumber(a.name) - slideNumber(b.name));

    const lines: string[] = [];
    for (const slide of slides) {
      const xml = await slide.async('string');
      const runs = Array.from(xml.matchAll(TEXT_RUN), (m) => decodeXmlEntities(m[1] ?? ''));
      const line = runs.join(' ').replace(/\s+/g, ' ').trim();
      if (line) lines.push(line);
    }

    return {
      text: lines.join('\n'),
      metadata: { extractor: this.name, slideCount: slides.length },
    };
  }
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { AddSourceUseCase, classifySource } from '../../src/application/AddSourceUseCase.js';
import { FileIngestor } from '../../src/application/FileIngestor.js';
import { WorkIngestor } from '../../src/application/WorkIngestor.js';
import { ExtractorRegistry } from '../../src/infrastructure/extraction/ExtractorRegistry.js';
import { HtmlExtractor } from '../../src/infrastructure/extraction/HtmlExtractor.js';
import { NodeFileSystemAdapter } from '../../src/infrastructure/filesystem/NodeFileSystemAdapter.js';
import type { WebPagePort } from '../../src/domain/ports/WebPagePort.js';
import { NotFoundError } from '../../src/domain/errors/DomainErrors.js';
import { createTestStore, makeWork, FakeBibliographic } from '../helpers/fakes.js';
import type { TestStore } from '../helpers/fakes.js';

class FakeWebPages implements WebPagePort {
  readonly pages = new Map<string, string>();

  async fetchHtml(url: string): Promise<string> {
    const html = this.pages.get(url);
    if (html === undefined) throw new NotFoundError('page', url);
    return html;
  }
}

describe('classifySource', () => {
  it.each([
    ['10.1234/test.1', 'doi'],
    ['https://doi.org/10.1234/test.1', 'doi'],
    ['0000-0002-1825-009X', 'orcid'],
    ['https://orcid.org/0000-0002-1825-0097', 'orcid'],
    ['https://example.com/post', 'url'],
    ['HTTP://EXAMPLE.COM', 'url'],
    ['./papers/membranes.pdf', 'file'],
    ['notes.md', 'file'],
  ])('should classify %s as %s', (source, kind) => {
    expect(classifySource(source)).toBe(kind);
  });
});

describe('AddSourceUseCase', () => {
  let store: TestStore;
  let bib: FakeBibliographic;
  let web: FakeWebPages;
  let tmpDir: string;
  let useCase: AddSourceUseCase;

  beforeEach(() => {
    store = createTestStore();
    bib = new FakeBibliographic();
    web = new FakeWebPages();
    tmpDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'litdb-add-')));

    const fileSystem = new NodeFileSystemAdapter();
    useCase = new AddSourceUseCase(
      bib,
      new WorkIngestor(bib, store.ingest),
      new FileIngestor(fileSystem, new ExtractorRegistry(), store.ingest),
      store.ingest,
      fileSystem,
      web,
      new HtmlExtractor(),
    );
  });

  afterEach(() => {
    store.dbMgr.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('DOI', () => {
    beforeEach(() => {
      bib.works.set('https://doi.org/10.1234/test.1', makeWork(1, {
        referenced_works: ['https://openalex.org/W2'],
        related_works: ['https://openalex.org/W3'],
      }));
      bib.works.set('https://doi.org/10.1234/test.2', makeWork(2));
      bib.works.set('https://doi.org/10.1234/test.3', makeWork(3));
      bib.pages.set('cites:W1', [[makeWork(4)]]);
    });

    it('should add only the work itself by default', async () => {
      const outcomes = await useCase.add('10.1234/test.1');

      expect(outcomes).toEqual([{ kind: 'inserted', identifier: 'https://doi.org/10.1234/test.1' }]);
      expect(store.corpus.get('https://doi.org/10.1234/test.1')?.metadata.openalexId).toBe('https://openalex.org/W1');
    });

    it('should also add references, citing and related works when asked', async () => {
      const outcomes = await useCase.add('https://doi.org/10.1234/test.1', {
        references: true,
        citing: true,
        related: true,
      });

      expect(outcomes.map((o) => o.identifier)).toEqual([
        'https://doi.org/10.1234/test.1',
        'https://doi.org/10.1234/test.2',
        'https://doi.org/10.1234/test.4',
        'https://doi.org/10.1234/test.3',
      ]);
      expect(outcomes.every((o) => o.kind === 'inserted')).toBe(true);
      expect(bib.queries).toEqual(['cites:W1']);
    });

    it('should skip a DOI that is already stored', async () => {
      await useCase.add('10.1234/test.1');
      const outcomes = await useCase.add('10.1234/test.1');

      expect(outcomes).toEqual([
        { kind: 'skipped', identifier: 'https://doi.org/10.1234/test.1', reason: 'duplicate' },
      ]);
    });

    it('should propagate NotFoundError for an unknown DOI', async () => {
      await expect(useCase.add('10.9999/missing')).rejects.toThrow(NotFoundError);
    });
  });

  it('should add every work of an ORCID', async () => {
    bib.pages.set('author.orcid:https://orcid.org/0000-0000-0000-0001', [[makeWork(5), makeWork(6)]]);

    const outcomes = await useCase.add('0000-0000-0000-0001');

    expect(outcomes.map((o) => o.kind)).toEqual(['inserted', 'inserted']);
    expect(store.corpus.count()).toBe(2);
  });

  it('should add a web page as its visible text keyed by URL', async () => {
    web.pages.set(
      'https://example.com/post',
      '<html><head><title>Post</title><script>track()</script></head><body><p>graphene   notes</p></body></html>',
    );

    const outcomes = await useCase.add(' https://example.com/post ');

    expect(outcomes).toEqual([{ kind: 'inserted', identifier: 'https://example.com/post' }]);
    const item = store.corpus.get('https://example.com/post');
    expect(item?.text).toBe('graphene notes');
    expect(item?.metadata.title).toBe('Post');
  });

  it('should add a local file under its canonical path', async () => {
    const file = path.join(tmpDir, 'note.md');
    fs.writeFileSync(file, '---\ntitle: Catalysts\n---\ncatalyst screening');

    const outcomes = await useCase.add(file);

    expect(outcomes).toEqual([{ kind: 'inserted', identifier: file }]);
    expect(store.corpus.get(file)?.metadata.title).toBe('Catalysts');
  });

  it('should throw NotFoundError for a missing file', async () => {
    await expect(useCase.add(path.join(tmpDir, 'missing.pdf'))).rejects.toThrow(NotFoundError);
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AskUseCase, buildPrompt } from '../../src/application/AskUseCase.js';
import type { CompletionPort } from '../../src/domain/ports/CompletionPort.js';
import { ExternalServiceError } from '../../src/domain/errors/DomainErrors.js';
import { createTestStore } from '../helpers/fakes.js';
import type { TestStore } from '../helpers/fakes.js';

class RecordingCompletion implements CompletionPort {
  readonly providerId = 'recording';
  readonly prompts: string[] = [];
  failure?: Error;

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.failure) throw this.failure;
    return 'Graphene is a catalyst support.';
  }
}

describe('buildPrompt', () => {
  it('should join reference texts with blank lines', () => {
    const prompt = buildPrompt('why?', [
      { identifier: 'a', text: 'first', score: 1 },
      { identifier: 'b', text: 'second', score: 0.5 },
    ]);
    expect(prompt).toBe('Using data: first\n\nsecond. Respond to the prompt: why?');
  });
});

describe('AskUseCase', () => {
  let store: TestStore;
  let completion: RecordingCompletion;
  let useCase: AskUseCase;

  beforeEach(async () => {
    store = createTestStore();
    completion = new RecordingCompletion();
    useCase = new AskUseCase(store.retrieval, completion);
    await store.ingest.submit({ identifier: 'note:a', text: 'graphene catalyst' });
    await store.ingest.submit({ identifier: 'note:b', text: 'polymer battery' });
  });

  afterEach(() => {
    store.dbMgr.close();
  });

  it('should answer from the closest items', async () => {
    const result = await useCase.ask('graphene', 1);

    expect(result.answer).toBe('Graphene is a catalyst support.');
    expect(result.references.map((r) => r.identifier)).toEqual(['note:a']);
    expect(completion.prompts).toEqual(['Using data: graphene catalyst. Respond to the prompt: graphene']);
  });

  it('should propagate completion failures', async () => {
    completion.failure = new ExternalServiceError('completion', 'upstream 503', 503);
    await expect(useCase.ask('graphene')).rejects.toThrow('upstream 503');
  });
});

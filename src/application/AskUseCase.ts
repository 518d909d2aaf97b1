import type { CompletionPort } from '../domain/ports/CompletionPort.js';
import type { RetrievalUseCase } from './RetrievalUseCase.js';
import type { ScoredItem } from './dto/SearchResults.js';

export interface AskResult {
  answer: string;
  references: ScoredItem[];
}

export function buildPrompt(prompt: string, references: readonly ScoredItem[]): string {
  const data = references.map((r) => r.text).join('\n\n');
  return `Using data: ${data}. Respond to the prompt: ${prompt}`;
}

/** 檢索增強問答：先以向量搜尋取 top-k 作為脈絡，再交給文字生成服務 */
export class AskUseCase {
  constructor(
    private readonly retrieval: RetrievalUseCase,
    private readonly completion: CompletionPort,
  ) {}

  async ask(prompt: string, k = 3): Promise<AskResult> {
    const references = await this.retrieval.vectorSearch(prompt, k);
    const answer = await this.completion.generate(buildPrompt(prompt, references));
    return { answer, references };
  }
}

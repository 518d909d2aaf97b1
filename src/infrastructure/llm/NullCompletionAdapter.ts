import type { CompletionPort } from '../../domain/ports/CompletionPort.js';
import { ExternalServiceError } from '../../domain/errors/DomainErrors.js';

/**
 * llm.provider 為 'none' 時使用
 * 呼叫端不需判斷 null，generate 直接回報服務未啟用
 */
export class NullCompletionAdapter implements CompletionPort {
  readonly providerId = 'none';

  async generate(_prompt: string): Promise<string> {
    throw new ExternalServiceError(
      'completion',
      'Completion service is disabled (llm.provider is "none")',
      400,
    );
  }
}

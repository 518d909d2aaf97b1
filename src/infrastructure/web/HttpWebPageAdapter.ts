import type { WebPagePort } from '../../domain/ports/WebPagePort.js';
import { ExternalServiceError, RateLimitError, errorMessage } from '../../domain/errors/DomainErrors.js';

export interface HttpWebPageConfig {
  timeoutMs: number;
  userAgent?: string;
}

export class HttpWebPageAdapter implements WebPagePort {
  constructor(private readonly config: HttpWebPageConfig) {}

  async fetchHtml(url: string, signal?: AbortSignal): Promise<string> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          Accept: 'text/html,application/xhtml+xml',
          'User-Agent': this.config.userAgent ?? 'litdb',
        },
        redirect: 'follow',
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (err) {
      throw new ExternalServiceError('web', `Could not fetch ${url}: ${errorMessage(err)}`, undefined, { cause: err });
    }

    if (response.status === 429) throw new RateLimitError('web');
    if (!response.ok) {
      throw new ExternalServiceError('web', `GET ${url} returned ${response.status}`, response.status);
    }
    return response.text();
  }
}

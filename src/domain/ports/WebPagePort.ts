export interface WebPagePort {
  fetchHtml(url: string, signal?: AbortSignal): Promise<string>;
}

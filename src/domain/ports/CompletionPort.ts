/** 文字生成服務（目前只有 ask 指令使用） */
export interface CompletionPort {
  readonly providerId: string;
  generate(prompt: string): Promise<string>;
}

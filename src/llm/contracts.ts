export type MessageContentPart =
  | { type: "text"; text: string }
  | { type: "image"; dataUrl: string };

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface LLMCompletion {
  content: string;
  usage: LLMUsage;
  model: string;
}

export interface LLMCallOptions {
  model?: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export interface LLMClient {
  complete(content: MessageContentPart[], options?: LLMCallOptions): Promise<LLMCompletion>;
}

export interface ModelInfo {
  id: string;
  ownedBy: string;
  /** Unix seconds, as the models API reports it. */
  created: number;
}

export interface ModelCatalog {
  listModels(): Promise<ModelInfo[]>;
  retrieveModel(id: string): Promise<ModelInfo>;
}

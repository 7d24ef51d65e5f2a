export type LlmMessage = { role: "system" | "user" | "assistant"; content: string };

export type LlmCallOptions = {
  model: string;
  timeoutMs?: number;
  temperature?: number;
};

export type LlmResponse = {
  text: string;
  outputTokens: number;
  durationMs: number;
};

/**
 * Model API boundary. Implementations throw `ModelError` for transport and configuration
 * failures; everything else about the reply (including garbage text) is returned as-is.
 */
export interface LlmProvider {
  name: string;
  complete(messages: readonly LlmMessage[], opts: LlmCallOptions): Promise<LlmResponse>;
}

export const DEFAULT_MODEL_TIMEOUT_MS = 120_000;

export const tokensPerSecond = (outputTokens: number, durationMs: number): number =>
  durationMs > 0 && outputTokens > 0 ? outputTokens / (durationMs / 1000) : 0;

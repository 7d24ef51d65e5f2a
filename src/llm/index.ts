import type { BenchConfig } from "../config/config.js";
import type { LlmProvider } from "./provider.js";
import { OllamaProvider } from "./providers/ollama.js";

export const getProviderFromConfig = (config: BenchConfig): LlmProvider =>
  new OllamaProvider({ baseUrl: config.ollamaBaseUrl });

export { ModelError, type ModelErrorKind } from "./errors.js";
export { tokensPerSecond, type LlmCallOptions, type LlmMessage, type LlmProvider, type LlmResponse } from "./provider.js";

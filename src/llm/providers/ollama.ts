import { z } from "zod";
import { errorMessage } from "../../errors.js";
import { ModelError } from "../errors.js";
import { DEFAULT_MODEL_TIMEOUT_MS, type LlmCallOptions, type LlmMessage, type LlmProvider, type LlmResponse } from "../provider.js";

const chatResponseSchema = z
  .object({
    message: z.object({ role: z.string().optional(), content: z.string().default("") }).passthrough(),
    eval_count: z.number().optional(),
    eval_duration: z.number().optional()
  })
  .passthrough();

// AbortSignal.timeout rejects with a DOMException, so match on the name only
const isAbort = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "name" in error &&
  (error.name === "AbortError" || error.name === "TimeoutError");

export class OllamaProvider implements LlmProvider {
  name = "ollama";
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(args: { baseUrl: string; fetchImpl?: typeof fetch }) {
    this.baseUrl = args.baseUrl.replace(/\/$/, "");
    this.fetchImpl = args.fetchImpl ?? fetch;
  }

  private transportError(error: unknown, model: string, timeoutMs: number, message: string): ModelError {
    if (isAbort(error)) {
      return new ModelError("TimedOut", model, `Ollama request exceeded timeout of ${timeoutMs}ms`, { cause: error });
    }
    return new ModelError("ConnectionFailed", model, message, { cause: error });
  }

  /** The timeout signal also covers the body, so a stalled or garbled body is a transport failure too. */
  private async readBody<T>(read: () => Promise<T>, model: string, timeoutMs: number): Promise<T> {
    try {
      return await read();
    } catch (error) {
      throw this.transportError(
        error,
        model,
        timeoutMs,
        `Invalid response body from Ollama API at ${this.baseUrl}: ${errorMessage(error)}`
      );
    }
  }

  async complete(messages: readonly LlmMessage[], opts: LlmCallOptions): Promise<LlmResponse> {
    const timeoutMs = opts.timeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS;
    const started = Date.now();

    const response = await this.fetchImpl(`${this.baseUrl}/api/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: opts.model,
        messages,
        stream: false,
        options: opts.temperature === undefined ? undefined : { temperature: opts.temperature }
      }),
      signal: AbortSignal.timeout(timeoutMs)
    }).catch((error: unknown) => {
      throw this.transportError(error, opts.model, timeoutMs, `Connection error to Ollama API at ${this.baseUrl}`);
    });

    if (!response.ok) {
      const text = await this.readBody(() => response.text(), opts.model, timeoutMs);
      if (response.status === 404 || /not found|does not exist/i.test(text)) {
        throw new ModelError("ModelNotFound", opts.model, `Model '${opts.model}' not found in Ollama`);
      }
      throw new ModelError("ConnectionFailed", opts.model, `Ollama API error ${response.status}: ${text.slice(0, 500)}`);
    }

    const body: unknown = await this.readBody(() => response.json(), opts.model, timeoutMs);
    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ModelError("ConnectionFailed", opts.model, `Unexpected Ollama response shape: ${parsed.error.message}`);
    }

    const evalDurationNs = parsed.data.eval_duration ?? 0;
    return {
      text: parsed.data.message.content,
      outputTokens: parsed.data.eval_count ?? 0,
      durationMs: evalDurationNs > 0 ? evalDurationNs / 1_000_000 : Date.now() - started
    };
  }
}

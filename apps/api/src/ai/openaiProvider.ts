import OpenAI from "openai";
import { ProviderError, errorMessage } from "../errors.js";
import type { GenerateRequest, GenerateResult, GenerationProvider, ProviderFactory } from "./provider.js";
import { estimateTokens } from "./provider.js";

export interface OpenAiProviderConfig {
  apiKey?: string;
  model: string;
  baseUrl?: string;
  timeoutMs: number;
}

export class OpenAiProvider implements GenerationProvider {
  public readonly id = "openai";
  private readonly client: OpenAI | null;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(config: OpenAiProviderConfig) {
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
    this.client = config.apiKey
      ? new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, timeout: config.timeoutMs, maxRetries: 1 })
      : null;
  }

  private requireClient(): OpenAI {
    if (!this.client) {
      throw new ProviderError("OPENAI_API_KEY is not configured");
    }
    return this.client;
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    const client = this.requireClient();

    try {
      const completion = await client.chat.completions.create(
        {
          model: this.model,
          max_tokens: request.maxTokens,
          temperature: 0.2,
          messages: [
            { role: "system", content: request.systemPrompt },
            { role: "user", content: request.prompt },
          ],
        },
        { signal: request.signal, timeout: this.timeoutMs },
      );

      const content = completion.choices[0]?.message?.content ?? "";
      const tokensUsed = completion.usage?.total_tokens ?? estimateTokens(request.prompt, content);
      return { content, tokensUsed };
    } catch (err) {
      throw new ProviderError(`OpenAI request failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async openStream(client: OpenAI, request: GenerateRequest) {
    try {
      return await client.chat.completions.create(
        {
          model: this.model,
          max_tokens: request.maxTokens,
          temperature: 0.2,
          stream: true,
          messages: [
            { role: "system", content: request.systemPrompt },
            { role: "user", content: request.prompt },
          ],
        },
        { signal: request.signal, timeout: this.timeoutMs },
      );
    } catch (err) {
      throw new ProviderError(`OpenAI stream failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async *generateStream(request: GenerateRequest): AsyncGenerator<string> {
    const stream = await this.openStream(this.requireClient(), request);

    // Si el consumidor corta, el for-await llama return() y el SDK aborta el request
    for await (const chunk of stream) {
      const delta = chunk.choices[0]?.delta?.content;
      if (delta) yield delta;
    }
  }
}

/** Factory: sin credenciales usa la key de la plataforma; con own-key crea un cliente del usuario. */
export function createOpenAiProviderFactory(config: OpenAiProviderConfig): ProviderFactory {
  const platform = new OpenAiProvider(config);
  return (credentials) => {
    if (!credentials) return platform;
    return new OpenAiProvider({
      ...config,
      apiKey: credentials.apiKey,
      model: credentials.model || config.model,
    });
  };
}

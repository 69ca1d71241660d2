// ─── Contrato del proveedor de generacion ──────────────────────────
// Al core solo le importa: texto + tokens usados, o una excepcion.

export interface GenerateRequest {
  prompt: string;
  systemPrompt: string;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface GenerateResult {
  content: string;
  tokensUsed: number;
}

export interface GenerationProvider {
  readonly id: string;
  generate(request: GenerateRequest): Promise<GenerateResult>;
  /** Chunks en orden de generacion. Cortar la iteracion cancela el request. */
  generateStream(request: GenerateRequest): AsyncIterable<string>;
}

/** Credencial propia del usuario (own-key). */
export interface ProviderCredentials {
  apiKey: string;
  model?: string | null;
}

/** Sin credenciales devuelve el proveedor de la plataforma. */
export type ProviderFactory = (credentials?: ProviderCredentials) => GenerationProvider;

/** Estimacion cuando el proveedor no reporta usage: (palabras prompt + respuesta) * 1.3 */
export function estimateTokens(prompt: string, content: string): number {
  const words = (text: string) => text.split(/\s+/).filter(Boolean).length;
  return Math.floor((words(prompt) + words(content)) * 1.3);
}

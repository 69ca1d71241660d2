// ─── redact.ts: Redaccion de secretos ──────────────────────────────
// Se aplica a toda salida de agentes antes de persistirla: el modelo puede
// devolver keys que vio en archivos del proyecto o en el prompt.

interface SecretPattern {
  name: string;
  pattern: RegExp;
  replacement: string;
}

const SECRET_PATTERNS: readonly SecretPattern[] = [
  { name: "anthropic_key", pattern: /\bsk-ant-[A-Za-z0-9_-]{20,}/g, replacement: "sk-ant-***REDACTED***" },
  { name: "openai_key", pattern: /\bsk-(?!ant-)[A-Za-z0-9_-]{20,}/g, replacement: "sk-***REDACTED***" },
  { name: "supabase_key", pattern: /\bsbp_[A-Za-z0-9_-]{20,}/g, replacement: "sbp_***REDACTED***" },
  { name: "stripe_key", pattern: /\b(sk|rk)_(live|test)_[A-Za-z0-9]{16,}/g, replacement: "$1_$2_***REDACTED***" },
  { name: "jwt", pattern: /\beyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}/g, replacement: "***JWT_REDACTED***" },
  { name: "bearer_header", pattern: /Authorization:\s*Bearer\s+\S+/gi, replacement: "Authorization: Bearer ***REDACTED***" },
  { name: "api_key_assignment", pattern: /\b(api[_-]?key|apikey)(\s*[=:]\s*)["']?[^\s"',]+["']?/gi, replacement: "$1$2***REDACTED***" },
  {
    name: "query_secret",
    pattern: /([?&])(token|key|secret|api_key|apikey|access_token)=[^&\s]+/gi,
    replacement: "$1$2=***REDACTED***",
  },
  { name: "db_url_password", pattern: /\b(postgres(?:ql)?|mysql|mongodb(?:\+srv)?):\/\/[^:\s/]+:[^@\s]+@/gi, replacement: "$1://***:***@" },
];

/** Oculta un valor dejando visibles los ultimos 4 chars si es largo. */
export function redactValue(value: string): string {
  if (value.length <= 8) return "***";
  return `***${value.slice(-4)}`;
}

export function redactPatterns(text: string): string {
  return SECRET_PATTERNS.reduce((result, { pattern, replacement }) => result.replace(pattern, replacement), text);
}

/**
 * Reemplaza primero los secretos conocidos (keys de la plataforma, own-key del
 * usuario) y despues los patrones genericos.
 */
export function redact(text: string, knownSecrets: readonly string[] = []): string {
  const sorted = knownSecrets.filter((secret) => secret.length > 6).sort((a, b) => b.length - a.length);

  let result = text;
  for (const secret of sorted) {
    result = result.replaceAll(secret, redactValue(secret));
  }
  return redactPatterns(result);
}

/** Nombres de los patrones que matchean (vacio si el texto esta limpio). */
export function findSecrets(text: string): string[] {
  return SECRET_PATTERNS.filter(({ pattern }) => new RegExp(pattern.source, pattern.flags.replace("g", "")).test(text)).map(
    ({ name }) => name,
  );
}

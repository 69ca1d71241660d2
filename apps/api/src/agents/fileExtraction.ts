import type { GeneratedFile } from "@crewforge/types";

// ─── Extraccion de archivos desde texto libre ──────────────────────
// Cadena ordenada de estrategias: la primera que devuelve algo gana.

export interface FileExtractionStrategy {
  name: string;
  extract(text: string): GeneratedFile[];
}

function collect(text: string, pattern: RegExp): GeneratedFile[] {
  const files: GeneratedFile[] = [];
  const seen = new Set<string>();

  for (const match of text.matchAll(pattern)) {
    const path = match[1]?.trim();
    const content = match[2]?.trim();
    if (!path || content === undefined || seen.has(path)) continue;
    seen.add(path);
    files.push({ path, content });
  }

  return files;
}

function regexStrategy(name: string, pattern: RegExp): FileExtractionStrategy {
  return {
    name,
    extract: (text) => collect(text, pattern),
  };
}

/** `### src/app.ts` seguido de un code fence. */
export const headingFence = regexStrategy(
  "heading_fence",
  /###\s*([\w/.\-]+\.\w+)\s*\n```\w*\n([\s\S]*?)```/g,
);

/** `File: app.ts`, `**app.ts**` o `app.ts` entre backticks en la linea anterior al fence. */
export const inlineFilenameFence = regexStrategy(
  "inline_filename_fence",
  /(?:File:\s*|\*\*|`)?([\w/.\-]+\.\w+)(?:\*\*|`)?[ \t]*\n```\w*\n([\s\S]*?)```/g,
);

/** Nombre de archivo en un comentario en la primera linea dentro del fence. */
export const commentFilenameFence = regexStrategy(
  "comment_filename_fence",
  /```\w*\n(?:#|\/\/|<!--|\/\*)\s*([\w/.\-]+\.\w+)[^\n]*\n([\s\S]*?)```/g,
);

/** Como inlineFilenameFence pero solo paths que parecen tests. */
export const testFilenameFence = regexStrategy(
  "test_filename_fence",
  /(?:File:\s*|\*\*)?([\w/.\-]*test[\w/.\-]*\.\w+)(?:\*\*)?[ \t]*\n```\w*\n([\s\S]*?)```/gi,
);

export const DEFAULT_FILE_STRATEGIES: readonly FileExtractionStrategy[] = [
  headingFence,
  inlineFilenameFence,
  commentFilenameFence,
];

export const TEST_FILE_STRATEGIES: readonly FileExtractionStrategy[] = [
  headingFence,
  testFilenameFence,
  inlineFilenameFence,
  commentFilenameFence,
];

export function extractFiles(
  text: string,
  strategies: readonly FileExtractionStrategy[] = DEFAULT_FILE_STRATEGIES,
): GeneratedFile[] {
  for (const strategy of strategies) {
    const files = strategy.extract(text);
    if (files.length > 0) return files;
  }
  return [];
}

import { buildApp, type BuiltApp } from "../../app.js";
import { createMemoryStore } from "../../store/memoryStore.js";
import type { Store } from "../../store/types.js";
import { ScriptedProvider } from "./fakeProvider.js";
import { testConfig } from "./testData.js";

export interface TestApp extends BuiltApp {
  provider: ScriptedProvider;
  store: Store;
}

export async function buildTestApp(env: Record<string, string> = {}): Promise<TestApp> {
  const provider = new ScriptedProvider();
  const store = createMemoryStore();
  const built = await buildApp(testConfig(env), { store, providerFactory: () => provider });

  await built.app.ready();
  return { ...built, provider, store };
}

export interface SseEvent {
  type: string;
  [key: string]: unknown;
}

/** Parsea un body `data: <json>\n\n`. */
export function parseSse(body: string): SseEvent[] {
  return body
    .split("\n\n")
    .filter((frame) => frame.startsWith("data: "))
    .map((frame) => JSON.parse(frame.slice("data: ".length)));
}

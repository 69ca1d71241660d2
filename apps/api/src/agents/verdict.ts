// ─── Veredicto del Verifier ────────────────────────────────────────
// Match por substring, case-insensitive. Si aparecen ambos marcadores gana
// el que aparece primero; sin marcador es FAIL.

export type Verdict = "PASS" | "FAIL";

const PASS_MARKERS = ["**PASS**", "VERDICT: PASS"];
const FAIL_MARKERS = ["**FAIL**", "VERDICT: FAIL"];

function firstIndex(text: string, markers: string[]): number {
  const hits = markers.map((marker) => text.indexOf(marker)).filter((index) => index >= 0);
  return hits.length > 0 ? Math.min(...hits) : -1;
}

export function detectVerdict(content: string): Verdict {
  const upper = content.toUpperCase();
  const pass = firstIndex(upper, PASS_MARKERS);
  const fail = firstIndex(upper, FAIL_MARKERS);

  if (pass < 0) return "FAIL";
  if (fail < 0) return "PASS";
  return pass < fail ? "PASS" : "FAIL";
}

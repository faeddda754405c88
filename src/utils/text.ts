const LATIN_LETTER = /[A-Za-z]/;

/**
 * Whether a string is worth sending for translation: non-blank and holding at
 * least one ASCII Latin letter somewhere. "共 A" qualifies; "123" does not.
 */
export function isCandidate(text: string): boolean {
  if (!text) return false;
  const trimmed = text.trim();
  if (!trimmed) return false;
  return LATIN_LETTER.test(trimmed);
}

/** Drops later repeats, keeping each value at its first position. */
export function dedupeStrings(strings: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const s of strings) {
    if (seen.has(s)) continue;
    seen.add(s);
    out.push(s);
  }
  return out;
}

export function preserveWhitespace(original: string, translated: string): string {
  const pre = original.match(/^\s+/)?.[0] ?? "";
  const suf = original.match(/\s+$/)?.[0] ?? "";
  return `${pre}${translated.trim()}${suf}`;
}

export function isNonTranslatable(text: string): boolean {
  if (!text) return true;
  if (/^\s+$/.test(text)) return true;
  if (/^[\s\d.,%+\-–—()\[\]{}<>:;!?/\\|@#^&*=~`'"€$£¥]+$/.test(text)) return true;
  return false;
}

export function compileIgnoreRegex(pattern: string): RegExp | null {
  const p = pattern?.trim();
  if (!p) return null;
  try {
    return new RegExp(p);
  } catch {
    return null;
  }
}

function clean(text: string): string {
  return text
    .trim()
    .replace(/^["'`]+|["'`.!]+$/g, '')
    .trim();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Map a free-form answer back onto one of the options. Tries an exact
 * (case-insensitive) option text, then a 1-based option number, then the
 * option named as a whole word inside the answer or the answer inside an
 * option. Of several matches the longest wins only when it contains the
 * others. Returns null when nothing matches; never guesses.
 */
export function matchOption(response: string, options: readonly string[]): string | null {
  const answer = clean(response);
  if (!answer || options.length === 0) {
    return null;
  }
  const lower = answer.toLowerCase();

  const exact = options.find((option) => option.trim().toLowerCase() === lower);
  if (exact !== undefined) {
    return exact;
  }

  if (/^\d+$/.test(answer)) {
    const index = Number(answer) - 1;
    return index >= 0 && index < options.length ? options[index] ?? null : null;
  }

  const named = options.filter((option) => {
    const text = option.trim();
    return text.length > 0 && new RegExp(`\\b${escapeRegExp(text)}\\b`, 'i').test(answer);
  });
  const inside = lower.length >= 3 ? options.filter((option) => option.toLowerCase().includes(lower)) : [];
  const candidates = named.length > 0 ? named : inside;
  if (candidates.length === 0) {
    return null;
  }
  const longest = candidates.reduce((best, option) => (option.length > best.length ? option : best));
  const within = longest.toLowerCase();
  // Several unrelated options named in one answer is ambiguous.
  return candidates.every((option) => within.includes(option.trim().toLowerCase())) ? longest : null;
}

const YES_WORDS = new Set(['yes', 'true', '1', 'y']);
const NO_WORDS = new Set(['no', 'false', '0', 'n']);

/** Read an answer as a boolean; undefined when it is neither yes-like nor no-like. */
export function parseYesNo(answer: string): boolean | undefined {
  const word = clean(answer).toLowerCase();
  if (YES_WORDS.has(word)) return true;
  if (NO_WORDS.has(word)) return false;
  return undefined;
}

const LEAD_INS = ['my name is', "i'm", 'i’m', 'i am', 'call me'];

const WORD = /^\p{L}+$/u;

function titleCase(word: string): string {
  const lower = word.toLowerCase();
  return lower.charAt(0).toUpperCase() + lower.slice(1);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const LEAD_IN_PATTERNS = LEAD_INS.map(
  leadIn => new RegExp(`(?<![\\p{L}])${escapeRegExp(leadIn)}\\s+(.*)$`, 'iu')
);

/**
 * Pulls a caller's name out of a reply such as "I'm Bob" or "call me Mary
 * Jane". After a lead-in the name is its first word, or both words when the
 * reply ends with exactly two. Without a lead-in the whole reply must be one
 * or two alphabetic words. Returns null when nothing name-like is found.
 */
export function extractName(text: string): string | null {
  const trimmed = text.trim();

  for (const pattern of LEAD_IN_PATTERNS) {
    const match = trimmed.match(pattern);
    if (!match) continue;

    const rest = match[1].replace(/[.!?,]+$/u, '').trim().split(/\s+/u);
    if (rest.length === 2 && rest.every(word => WORD.test(word))) {
      return rest.map(titleCase).join(' ');
    }

    const first = rest[0].replace(/[.,!?]+$/u, '');
    if (WORD.test(first)) {
      return titleCase(first);
    }
  }

  const words = trimmed.split(/\s+/u).filter(w => w.length > 0);
  if ((words.length === 1 || words.length === 2) && words.every(word => WORD.test(word))) {
    return words.map(titleCase).join(' ');
  }

  return null;
}

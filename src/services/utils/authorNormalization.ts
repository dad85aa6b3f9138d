// "J.", "J. K.", "J.-P.", "JK" - a fragment made only of initials belongs to
// the surname before it ("Smith, J.")
const INITIALS_ONLY = /^\p{Lu}\.?(?:[\s-]*\p{Lu}\.?)*$/u;

// "et al." as words, so a surname like "Etalle" is left alone
const ET_AL = /\bet\s+al\b\.?/gi;

// ';', '&' and the word "and" always separate authors
const AUTHOR_SEPARATORS = /\s*(?:;|&|\band\b)\s*/i;

export function isInitialsOnly(fragment: string): boolean {
  const f = fragment.trim();
  if (!INITIALS_ONLY.test(f)) return false;
  // without periods only short runs count, so "DOE" stays a surname
  return f.includes('.') || f.replace(/[\s-]/g, '').length <= 2;
}

/**
 * Parse an author string into individual names, in citation order.
 * "Smith, J., Doe, A., & Lee, K." -> ["Smith, J.", "Doe, A.", "Lee, K."]
 */
export function parseAuthors(authorString: string): string[] {
  const authors: string[] = [];

  for (const group of authorString.replace(ET_AL, ' ').split(AUTHOR_SEPARATORS)) {
    let pending = '';
    let pendingHasInitials = false;

    for (const raw of group.split(/\s*,\s*/)) {
      const fragment = raw.trim();
      if (!fragment) continue;

      if (pending && isInitialsOnly(fragment)) {
        pending = pendingHasInitials ? `${pending} ${fragment}` : `${pending}, ${fragment}`;
        pendingHasInitials = true;
        continue;
      }

      if (pending) authors.push(pending);
      pending = fragment;
      pendingHasInitials = false;
    }

    if (pending) authors.push(pending);
  }

  return authors.filter(a => /[\p{L}]/u.test(a));
}

/**
 * Family name of one author: the part before the comma in "Smith, J.",
 * the last word in "John Smith"
 */
export function surnameOf(name: string): string {
  const trimmed = name.trim();
  const comma = trimmed.indexOf(',');
  if (comma > 0) return trimmed.slice(0, comma).trim();
  const words = trimmed.split(/\s+/);
  return words[words.length - 1] ?? trimmed;
}

// DOI pattern: 10.xxxx/xxxxx
const DOI_PATTERN = /10\.\d{4,9}\/[^\s"'<>\]]+/gi;

// URL patterns
const URL_PATTERN = /https?:\/\/[^\s"'<>\]]+/gi;

const TRAILING_PUNCTUATION = /[.,;:)\]]+$/;

/**
 * Extract DOI from text
 */
export function extractDOI(text: string): string | null {
  const matches = text.match(DOI_PATTERN);
  if (matches && matches.length > 0) {
    // Clean up the DOI (remove trailing punctuation)
    return matches[0].replace(TRAILING_PUNCTUATION, '') || null;
  }
  return null;
}

/**
 * Extract all URLs from text
 */
export function extractURLs(text: string): string[] {
  const matches = text.match(URL_PATTERN);
  if (matches) {
    return matches.map(url => url.replace(TRAILING_PUNCTUATION, ''));
  }
  return [];
}


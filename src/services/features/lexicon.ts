// Word lists used by token features. Entries are lower case without
// trailing punctuation.

export const STOP_WORDS = new Set([
  'a', 'an', 'and', 'as', 'at', 'by', 'for', 'from', 'in', 'into',
  'of', 'on', 'or', 'the', 'to', 'via', 'with',
]);

export const CONJUNCTIONS = new Set(['and', '&', 'und', 'et']);

export const VENUE_KEYWORDS = new Set([
  'journal', 'j', 'proceedings', 'proc', 'conference', 'conf', 'symposium',
  'workshop', 'transactions', 'trans', 'review', 'rev', 'letters', 'lett',
  'magazine', 'bulletin', 'annals', 'ann', 'quarterly', 'acta', 'studies',
  'preprint', 'arxiv', 'biorxiv', 'medrxiv',
]);

export const PUBLISHER_KEYWORDS = new Set([
  'press', 'publisher', 'publishers', 'publishing', 'springer', 'elsevier',
  'wiley', 'routledge', 'sage', 'mit', 'ieee', 'acm', 'verlag',
]);

// Abbreviations that end in a period without ending a sentence
export const NON_TERMINAL_ABBREVIATIONS = new Set([
  'al', 'eds', 'ed', 'vol', 'no', 'pp', 'p', 'j', 'proc', 'conf', 'trans',
  'int', 'natl', 'am', 'soc', 'sci', 'rev', 'res', 'vs', 'etc', 'dr', 'st',
]);

const POLITENESS_RE = /\b(?:please|can you|could you|would you|kindly)\b/g;

const NUMBER_WORDS = new Map<string, string>([
  ['one', '1'],
  ['two', '2'],
  ['three', '3'],
  ['four', '4'],
  ['five', '5'],
  ['six', '6'],
  ['seven', '7'],
  ['eight', '8'],
  ['nine', '9'],
  ['ten', '10'],
]);

const TYPO_FIXES = new Map<string, string>([
  ['cret', 'create'],
  ['cretae', 'create'],
  ['delte', 'delete'],
  ['schma', 'schema'],
  ['shema', 'schema'],
  ['indx', 'index'],
  ['colum', 'column'],
]);

/**
 * Canonical form of a request line: lower case, politeness and trailing
 * punctuation dropped, whitespace collapsed, number words and common typos
 * replaced word by word.
 */
export function normalizeRequest(text: string): string {
  const folded = text
    .trim()
    .toLowerCase()
    .replace(POLITENESS_RE, ' ')
    .replace(/[\s;.?!]+$/, '')
    .replace(/\s+/g, ' ')
    .trim();

  return folded.replace(/\b[a-z]+\b/g, (word) => TYPO_FIXES.get(word) ?? NUMBER_WORDS.get(word) ?? word);
}

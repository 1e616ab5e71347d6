// Characters with meaning in JavaScript (and PCRE) regular expressions.
const JS_SPECIAL = /[.*+?^${}()|[\]\\/-]/g;

// Lucene's regexp syntax reserves a wider set, including the optional
// operators (#, @, &, <, >, ~) and the double quote.
const LUCENE_SPECIAL = /[.?+*|{}[\]()"\\#@&<>~^$-]/g;

export function escapeRegExp(text: string): string {
  return text.replace(JS_SPECIAL, '\\$&');
}

export function escapeLucene(text: string): string {
  return text.replace(LUCENE_SPECIAL, '\\$&');
}

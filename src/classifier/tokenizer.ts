/**
 * Tokenizer for the few-shot model: word tokens, stopwords removed,
 * Porter-stemmed. Input is expected to be normalized already.
 */

import natural from 'natural';

const STOPWORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'to', 'for', 'of', 'in', 'on', 'at', 'with',
  'about', 'into', 'is', 'it', 'be', 'this', 'that', 'was', 'were', 'are', 'am',
  'as', 'but', 'so', 'if', 'from', 'by', 'my', 'me', 'we', 'our', 'us', 'you', 'i',
  'please', 'can', 'do', 'does',
]);

const wordTokenizer = new natural.WordTokenizer();

export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const word of wordTokenizer.tokenize(text.toLowerCase())) {
    if (word.length <= 1 || STOPWORDS.has(word)) continue;
    tokens.push(natural.PorterStemmer.stem(word));
  }
  return tokens;
}

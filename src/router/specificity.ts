/**
 * Keyword specificity: 1 / (1 + log2(df)), where df is the number of nodes
 * sharing the keyword. A keyword unique to one node scores 1.
 */
export function specificity(documentFrequency: number): number {
  if (documentFrequency <= 1) return 1;
  return 1 / (1 + Math.log2(documentFrequency));
}

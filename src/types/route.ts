/**
 * Route Types
 *
 * Keyword index entries. Derived from node content, never authoritative.
 */

export interface RouteEntry {
  keyword: string;
  nodeIds: string[];
  /** Keyword specificity in [0, 1]; rarer keywords score higher */
  confidence: number;
}

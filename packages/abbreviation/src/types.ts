/**
 * Abbreviation tree types
 */

/**
 * One element of a parsed abbreviation such as `div.root*3`.
 *
 * `className` is `""` rather than absent when no `.class` was written, so the
 * serializer only has to test for emptiness.
 */
export interface AbbreviationNode {
  label: string;
  className: string;
  id: string | null;
  /** 1 when no `*count` was written; 0 suppresses the node entirely */
  repeatCount: number;
  /** Nodes introduced by `>`, in source order */
  children: AbbreviationNode[];
}

/** Counts saturate here (2^32 - 1) instead of wrapping. */
export const MAX_REPEAT_COUNT = 0xffff_ffff;

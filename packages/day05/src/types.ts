/** Precedence constraint: every `before` page must precede every `after` page it shares a sequence with. */
export type Rule = readonly [before: number, after: number];

/** One candidate print ordering. Pages may repeat. */
export type Sequence = readonly number[];

export interface PrintQueue {
  rules: Rule[];
  sequences: Sequence[];
}

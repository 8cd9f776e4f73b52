// ---------------------------------------------------------------------------
// Range expression model
// ---------------------------------------------------------------------------

/** A bare number inside the brackets, e.g. `7` or `0007` */
export interface SingularComponent {
  kind: "singular";
  value: number;
  /** Characters in the literal as written; "0007" has width 4 */
  literalWidth: number;
  literal: string;
}

/** An inclusive ascending range, e.g. `0001-0025` */
export interface RangeSpanComponent {
  kind: "range";
  start: number;
  end: number;
  /** Width of the start literal; the end literal does not affect padding */
  literalWidth: number;
  literal: string;
}

export type RangeComponent = SingularComponent | RangeSpanComponent;

/** Components in the order they were written. Never empty. */
export type RangeExpression = readonly [RangeComponent, ...RangeComponent[]];

/**
 * The target URL split around its bracket group:
 * `prefix + "[" + expression + "]" + suffix` is the original string.
 */
export interface UrlTemplate {
  readonly prefix: string;
  readonly expression: string;
  readonly suffix: string;
}

export interface ParsedTarget {
  template: UrlTemplate;
  expression: RangeExpression;
}

/** Zero-padded decimal form of one expanded number */
export type ExpandedToken = string;

/** One concrete download target */
export interface MaterializedTarget {
  /** 0-based position in the token sequence */
  index: number;
  token: ExpandedToken;
  url: string;
}

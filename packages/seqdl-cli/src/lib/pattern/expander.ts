import { patternTooLarge } from "../errors/catalog.js";
import type { ExpandedToken, RangeComponent, RangeExpression } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TokenSequenceOptions {
  /** Upper bound on the number of tokens a pattern may expand to */
  maxItems: number;
}

/**
 * Lazy, restartable token sequence. Every iteration starts from the
 * first component again and yields the same tokens.
 */
export interface TokenSequence extends Iterable<ExpandedToken> {
  readonly count: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_ITEMS = 100_000;

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/**
 * Left-pad a number with zeros to at least `width` characters.
 * Numbers already wider than `width` are left as they are.
 */
export function formatToken(value: number, width: number): ExpandedToken {
  return String(value).padStart(width, "0");
}

// ---------------------------------------------------------------------------
// Expansion
// ---------------------------------------------------------------------------

function componentSize(component: RangeComponent): number {
  return component.kind === "singular" ? 1 : component.end - component.start + 1;
}

/**
 * Number of tokens an expression expands to, computed without expanding it.
 */
export function countTokens(expression: RangeExpression): number {
  return expression.reduce((total, component) => total + componentSize(component), 0);
}

function* expandComponent(component: RangeComponent): Generator<ExpandedToken> {
  if (component.kind === "singular") {
    yield formatToken(component.value, component.literalWidth);
    return;
  }

  for (let n = component.start; n <= component.end; n++) {
    yield formatToken(n, component.literalWidth);
  }
}

/**
 * Expand components in written order. Overlapping components are not
 * deduplicated; each occurrence is emitted.
 */
export function* expandTokens(expression: RangeExpression): Generator<ExpandedToken> {
  for (const component of expression) {
    yield* expandComponent(component);
  }
}

/**
 * Build the token sequence for an expression, rejecting it up front when
 * it would exceed `maxItems`.
 */
export function createTokenSequence(
  expression: RangeExpression,
  options: TokenSequenceOptions = { maxItems: DEFAULT_MAX_ITEMS }
): TokenSequence {
  const count = countTokens(expression);

  if (count > options.maxItems) {
    throw patternTooLarge(count, options.maxItems);
  }

  return {
    count,
    [Symbol.iterator]: () => expandTokens(expression),
  };
}

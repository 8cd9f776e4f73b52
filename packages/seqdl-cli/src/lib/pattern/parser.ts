import { invalidRange, malformedPattern } from "../errors/catalog.js";
import type {
  ParsedTarget,
  RangeComponent,
  RangeExpression,
  UrlTemplate,
} from "./types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const SINGULAR_RE = /^([0-9]+)$/;
const RANGE_RE = /^([0-9]+)-([0-9]+)$/;

// ---------------------------------------------------------------------------
// Bracket location
// ---------------------------------------------------------------------------

/**
 * Find the single `[...]` group in the URL.
 * Rejects missing, repeated, nested and unbalanced brackets.
 */
export function splitTemplate(targetUrl: string): UrlTemplate {
  let open = -1;
  let close = -1;
  let depth = 0;

  for (let i = 0; i < targetUrl.length; i++) {
    const ch = targetUrl[i];

    if (ch === "[") {
      if (depth > 0) {
        throw malformedPattern("nested brackets", targetUrl.slice(open, i + 1));
      }
      if (close !== -1) {
        throw malformedPattern(
          "only one bracket group is supported per URL",
          targetUrl.slice(i)
        );
      }
      depth = 1;
      open = i;
    } else if (ch === "]") {
      if (depth === 0) {
        throw malformedPattern("unbalanced ']'", targetUrl.slice(0, i + 1));
      }
      depth = 0;
      close = i;
    }
  }

  if (depth > 0) {
    throw malformedPattern("unclosed '['", targetUrl.slice(open));
  }
  if (open === -1) {
    throw malformedPattern("no number range in brackets was found", targetUrl);
  }

  return {
    prefix: targetUrl.slice(0, open),
    expression: targetUrl.slice(open + 1, close),
    suffix: targetUrl.slice(close + 1),
  };
}

// ---------------------------------------------------------------------------
// Component parsing
// ---------------------------------------------------------------------------

function toSafeInteger(literal: string, segment: string): number {
  const value = Number(literal);
  if (!Number.isSafeInteger(value)) {
    throw malformedPattern("number is too large", segment);
  }
  return value;
}

/**
 * Parse one comma-separated entry: `7`, `0007` or `1-25`.
 */
export function parseComponent(raw: string): RangeComponent {
  const literal = raw.trim();

  if (literal === "") {
    throw malformedPattern("empty entry between commas", raw);
  }

  const singular = SINGULAR_RE.exec(literal);
  if (singular) {
    const digits = singular[1];
    return {
      kind: "singular",
      value: toSafeInteger(digits, literal),
      literalWidth: digits.length,
      literal,
    };
  }

  const range = RANGE_RE.exec(literal);
  if (range) {
    const [, startDigits, endDigits] = range;
    const start = toSafeInteger(startDigits, literal);
    const end = toSafeInteger(endDigits, literal);

    if (start > end) {
      throw invalidRange(literal, start, end);
    }

    return {
      kind: "range",
      start,
      end,
      literalWidth: startDigits.length,
      literal,
    };
  }

  throw malformedPattern(
    "expected a number or two numbers joined by '-'",
    literal
  );
}

/**
 * Parse the text between the brackets into its components.
 */
export function parseExpression(text: string): RangeExpression {
  const [first, ...rest] = text.split(",").map(parseComponent);
  if (first === undefined) {
    throw malformedPattern("empty brackets", `[${text}]`);
  }
  return [first, ...rest];
}

/**
 * Split a target URL into its template and parsed range expression.
 *
 * @example
 * parseTargetUrl("http://www.example.com/c[1,2-5].jpg")
 * // template: { prefix: "http://www.example.com/c", expression: "1,2-5", suffix: ".jpg" }
 */
export function parseTargetUrl(targetUrl: string): ParsedTarget {
  const template = splitTemplate(targetUrl);

  if (template.expression.trim() === "") {
    throw malformedPattern("empty brackets", `[${template.expression}]`);
  }

  return { template, expression: parseExpression(template.expression) };
}

import { invalidOption } from "./errors/catalog.js";
import type { MaterializedTarget, UrlTemplate } from "./pattern/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Maps a download target to the file name it is saved under */
export type OutputNamer = (target: MaterializedTarget) => string;

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const TOKEN_PLACEHOLDER = "{token}";
export const INDEX_PLACEHOLDER = "{index}";

const PATH_SEPARATOR_RE = /[/\\]/;
const PATH_SEPARATORS_RE = /[/\\]/g;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function stripQueryAndFragment(value: string): string {
  const cut = value.search(/[?#]/);
  return cut === -1 ? value : value.slice(0, cut);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Last path segment of a URL, percent-decoded, with any separators that
 * decoding produced replaced so the result stays a single file name.
 */
export function lastPathSegment(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = stripQueryAndFragment(url);
  }

  const segment = pathname.slice(pathname.lastIndexOf("/") + 1);
  const decoded = safeDecode(segment).replace(PATH_SEPARATORS_RE, "_");
  return decoded === "." || decoded === ".." ? "" : decoded;
}

/**
 * Whether the bracket group sits inside the last path segment of the URL,
 * in which case that segment alone already tells the files apart.
 */
export function tokenInFileName(template: UrlTemplate): boolean {
  const { prefix, suffix } = template;

  if (/[?#]/.test(prefix)) return false;

  const schemeEnd = prefix.indexOf("://");
  const afterScheme = schemeEnd === -1 ? prefix : prefix.slice(schemeEnd + 3);
  if (schemeEnd !== -1 && !afterScheme.includes("/")) return false;

  return !stripQueryAndFragment(suffix).includes("/");
}

// ---------------------------------------------------------------------------
// Namers
// ---------------------------------------------------------------------------

function validateNameTemplate(nameTemplate: string): void {
  if (!nameTemplate.includes(TOKEN_PLACEHOLDER)) {
    throw invalidOption(
      "name",
      `must contain ${TOKEN_PLACEHOLDER} so every file gets its own name`
    );
  }
  if (PATH_SEPARATOR_RE.test(nameTemplate)) {
    throw invalidOption("name", "must be a file name, not a path; use --output for the directory");
  }
}

/**
 * Create the naming policy for a run.
 *
 * With a name template, `{token}` and `{index}` (1-based) are substituted.
 * Without one, files keep the last path segment of their URL, prefixed with
 * the token whenever that segment would be the same for every target.
 */
export function createOutputNamer(template: UrlTemplate, nameTemplate?: string): OutputNamer {
  if (nameTemplate !== undefined) {
    validateNameTemplate(nameTemplate);
    return (target) =>
      nameTemplate
        .split(TOKEN_PLACEHOLDER)
        .join(target.token)
        .split(INDEX_PLACEHOLDER)
        .join(String(target.index + 1));
  }

  const distinct = tokenInFileName(template);

  return (target) => {
    const segment = lastPathSegment(target.url);
    if (segment === "") return target.token;
    if (distinct) return segment;
    return `${target.token}-${segment}`;
  };
}

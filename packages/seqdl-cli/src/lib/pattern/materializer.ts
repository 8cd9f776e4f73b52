import type { ExpandedToken, MaterializedTarget, UrlTemplate } from "./types.js";

function assertTemplate(template: UrlTemplate): void {
  if (typeof template.prefix !== "string" || typeof template.suffix !== "string") {
    throw new Error("URL template was not produced by parseTargetUrl");
  }
}

export function formatUrl(template: UrlTemplate, token: ExpandedToken): string {
  return template.prefix + token + template.suffix;
}

/**
 * Pair each token with its concrete URL. Pure string composition; nothing
 * is fetched or written here.
 */
export function* materializeUrls(
  template: UrlTemplate,
  tokens: Iterable<ExpandedToken>
): Generator<MaterializedTarget> {
  assertTemplate(template);

  let index = 0;
  for (const token of tokens) {
    yield { index, token, url: formatUrl(template, token) };
    index++;
  }
}

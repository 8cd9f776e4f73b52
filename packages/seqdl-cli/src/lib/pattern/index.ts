export type {
  ExpandedToken,
  MaterializedTarget,
  ParsedTarget,
  RangeComponent,
  RangeExpression,
  UrlTemplate,
} from "./types.js";
export { parseTargetUrl, parseExpression, parseComponent, splitTemplate } from "./parser.js";
export {
  createTokenSequence,
  expandTokens,
  countTokens,
  formatToken,
  DEFAULT_MAX_ITEMS,
  type TokenSequence,
  type TokenSequenceOptions,
} from "./expander.js";
export { materializeUrls, formatUrl } from "./materializer.js";

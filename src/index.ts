export {
  UrlCanonicalizer,
  normalizePath,
  type CanonicalResult,
  type CanonicalizerOpts,
} from "./util/canonicalizer.js";
export { ParameterHandling, DEFAULT_SESSION_TOKENS } from "./util/constants.js";
export { InvalidArgumentError, UrlSyntaxError } from "./util/errors.js";
export {
  SessionTokenRegistry,
  noSessionTokens,
  type SessionTokenSource,
} from "./util/sessiontokens.js";
export {
  TextUrlScanner,
  parseMediaType,
  type FoundUrl,
  type FoundUrlListener,
  type ScanResource,
} from "./util/textscanner.js";
export {
  formatUri,
  parseUri,
  resolveUri,
  type UriReference,
} from "./util/uri.js";

import { DEFAULT_PORTS, ParameterHandling } from "./constants.js";
import { UrlSyntaxError } from "./errors.js";
import { logger } from "./logger.js";
import { cleanStructuredPath } from "./pathsegments.js";
import {
  QueryParam,
  cleanQueryParams,
  formatQuery,
  parseQuery,
  sortParams,
} from "./queryparams.js";
import { SessionTokenRegistry, SessionTokenSource } from "./sessiontokens.js";
import {
  UriReference,
  formatAuthority,
  formatUri,
  parseUri,
  resolveUri,
} from "./uri.js";

export type CanonicalResult =
  | { status: "canonical"; url: string }
  | { status: "unsupported"; reason: string }
  | { status: "malformed"; error: string };

export type CanonicalizerOpts = {
  handleParameters?: ParameterHandling;
  handleStructuredSegments?: boolean;
  sessionTokens?: SessionTokenSource;
};

type CleanedParts = {
  prefix: string;
  path: string;
  params: QueryParam[];
};

// ===========================================================================
// Normalizes the path of an absolute URL:
// - repeated slashes collapse into one
// - "." segments are dropped
// - ".." followed by more path removes the segment before it, or is dropped
//   at the root
// - a trailing ".." removes the segment before it, but is kept as is at the
//   root, so "/.." stays "/.."
export function normalizePath(path: string) {
  let result = path.replace(/\/{2,}/g, "/");

  while (result.includes("/./")) {
    result = result.replace("/./", "/");
  }
  if (result.endsWith("/.")) {
    result = result.slice(0, -1);
  }

  let idx: number;
  while ((idx = result.indexOf("/../")) >= 0) {
    const prevSlash = idx > 0 ? result.lastIndexOf("/", idx - 1) : -1;
    if (prevSlash >= 0) {
      result = result.slice(0, prevSlash) + result.slice(idx + 3);
    } else {
      result = result.slice(idx + 3);
    }
  }

  if (result.endsWith("/..") && result.length > 3) {
    const prevSlash = result.lastIndexOf("/", result.length - 4);
    if (prevSlash >= 0) {
      result = result.slice(0, prevSlash + 1);
    }
  }

  return result;
}

// ===========================================================================
export class UrlCanonicalizer {
  handleParameters: ParameterHandling;
  handleStructuredSegments: boolean;
  sessionTokens: SessionTokenSource;

  constructor({
    handleParameters = ParameterHandling.UseAll,
    handleStructuredSegments = false,
    sessionTokens = new SessionTokenRegistry(),
  }: CanonicalizerOpts = {}) {
    this.handleParameters = handleParameters;
    this.handleStructuredSegments = handleStructuredSegments;
    this.sessionTokens = sessionTokens;
  }

  canonicalize(
    raw: string,
    base: string | null = null,
    excludedParams: Iterable<string> = [],
  ): CanonicalResult {
    let uri: UriReference;

    try {
      uri = parseUri(raw);
      if (base !== null && uri.scheme === null) {
        uri = resolveUri(uri, parseUri(base));
      }
    } catch (e) {
      if (e instanceof UrlSyntaxError) {
        logger.debug(
          "Malformed URL, not canonicalized",
          { url: raw, base, input: e.input, error: e.message },
          "canonical",
        );
        return { status: "malformed", error: e.message };
      }
      throw e;
    }

    if (uri.scheme === null) {
      return { status: "unsupported", reason: "URL has no scheme" };
    }

    if (uri.authority === null) {
      return { status: "unsupported", reason: "URL has no authority" };
    }

    if (!uri.authority.host) {
      return { status: "unsupported", reason: "URL has an empty host" };
    }

    const scheme = uri.scheme.toLowerCase();

    // leading zeros do not make a different port
    let port = uri.authority.port ? String(Number(uri.authority.port)) : null;
    if (port === DEFAULT_PORTS[scheme]) {
      port = null;
    }

    const path = normalizePath(uri.path) || "/";

    const cleaned = this.cleanParts(
      {
        ...uri,
        scheme,
        authority: {
          ...uri.authority,
          host: uri.authority.host.toLowerCase(),
          port,
        },
        path,
      },
      this.handleParameters,
      this.handleStructuredSegments,
      excludedParams,
    );

    const query = formatQuery(sortParams(cleaned.params));

    return {
      status: "canonical",
      url: cleaned.prefix + cleaned.path + (query ? "?" + query : ""),
    };
  }

  cleanParameters(
    uri: string | UriReference,
    mode: ParameterHandling,
    handleStructuredSegments: boolean,
    excludedParams: Iterable<string> = [],
  ): string {
    const parsed = typeof uri === "string" ? parseUri(uri) : uri;

    if (parsed.scheme === null || parsed.authority === null) {
      throw new UrlSyntaxError(
        "Absolute URL with an authority required",
        typeof uri === "string" ? uri : formatUri(uri),
      );
    }

    const { prefix, path, params } = this.cleanParts(
      parsed,
      mode,
      handleStructuredSegments,
      excludedParams,
    );

    const query = formatQuery(params);
    return prefix + path + (query ? "?" + query : "");
  }

  private cleanParts(
    uri: UriReference,
    mode: ParameterHandling,
    handleStructuredSegments: boolean,
    excludedParams: Iterable<string>,
  ): CleanedParts {
    const excluded = new Set(excludedParams);
    const isExcluded = (name: string) =>
      excluded.has(name) || this.sessionTokens.isSessionToken(name);

    const prefix =
      `${uri.scheme}://` + (uri.authority ? formatAuthority(uri.authority) : "");

    const path = handleStructuredSegments
      ? cleanStructuredPath(uri.path, mode)
      : uri.path;

    const params =
      uri.query !== null
        ? cleanQueryParams(parseQuery(uri.query), mode, isExcluded)
        : [];

    return { prefix, path, params };
  }
}

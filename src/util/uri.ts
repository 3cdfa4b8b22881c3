import { MAX_PORT } from "./constants.js";
import { UrlSyntaxError } from "./errors.js";

export type Authority = {
  userinfo: string | null;
  host: string;
  port: string | null;
};

// components are kept exactly as written, percent-encoding included
export type UriReference = {
  scheme: string | null;
  authority: Authority | null;
  path: string;
  query: string | null;
  fragment: string | null;
};

// RFC 3986, Appendix B
const URI_RX = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/;

const SCHEME_RX = /^[A-Za-z][A-Za-z0-9+.-]*$/;

// controls, space, DEL, non-ASCII and the characters RFC 3986 never allows
const DISALLOWED_CHAR_RX = /[^\x21-\x7e]|["<>\\^`{|}]/;

const BAD_PERCENT_RX = /%(?![0-9A-Fa-f]{2})/;

const PORT_RX = /^[0-9]*$/;

// ===========================================================================
export function parseUri(raw: string): UriReference {
  const input = raw.trim();

  const badChar = input.match(DISALLOWED_CHAR_RX);
  if (badChar) {
    throw new UrlSyntaxError(
      `Invalid character ${JSON.stringify(badChar[0])} at index ${badChar.index}`,
      raw,
    );
  }

  if (BAD_PERCENT_RX.test(input)) {
    throw new UrlSyntaxError("Invalid percent-encoded octet", raw);
  }

  const m = input.match(URI_RX);
  if (!m) {
    throw new UrlSyntaxError("Unable to split URI into components", raw);
  }

  const [, scheme, authority, path, query, fragment] = m;

  if (scheme !== undefined && !SCHEME_RX.test(scheme)) {
    throw new UrlSyntaxError(`Invalid scheme "${scheme}"`, raw);
  }

  if (
    scheme === undefined &&
    authority === undefined &&
    path.split("/")[0].includes(":")
  ) {
    throw new UrlSyntaxError("Colon in first segment of relative path", raw);
  }

  return {
    scheme: scheme ?? null,
    authority:
      authority !== undefined ? parseAuthority(authority, raw) : null,
    path,
    query: query ?? null,
    fragment: fragment ?? null,
  };
}

function parseAuthority(authority: string, raw: string): Authority {
  let rest = authority;
  let userinfo: string | null = null;

  const at = rest.lastIndexOf("@");
  if (at >= 0) {
    userinfo = rest.slice(0, at);
    rest = rest.slice(at + 1);
  }

  let host = rest;
  let port: string | null = null;

  if (rest.startsWith("[")) {
    const close = rest.indexOf("]");
    if (close < 0) {
      throw new UrlSyntaxError("Unterminated IP literal in authority", raw);
    }
    host = rest.slice(0, close + 1);
    const after = rest.slice(close + 1);
    if (after) {
      if (!after.startsWith(":")) {
        throw new UrlSyntaxError("Unexpected text after IP literal", raw);
      }
      port = after.slice(1);
    }
  } else {
    const colon = rest.indexOf(":");
    if (colon >= 0) {
      host = rest.slice(0, colon);
      port = rest.slice(colon + 1);
    }
  }

  if (port !== null) {
    if (!PORT_RX.test(port)) {
      throw new UrlSyntaxError(`Invalid port "${port}"`, raw);
    }
    if (port && Number(port) > MAX_PORT) {
      throw new UrlSyntaxError(`Port ${port} out of range`, raw);
    }
  }

  return { userinfo, host, port };
}

// ===========================================================================
export function formatAuthority({ userinfo, host, port }: Authority) {
  let result = userinfo !== null ? userinfo + "@" : "";
  result += host;
  if (port !== null) {
    result += ":" + port;
  }
  return result;
}

export function formatUri(uri: UriReference) {
  let result = "";
  if (uri.scheme !== null) {
    result += uri.scheme + ":";
  }
  if (uri.authority !== null) {
    result += "//" + formatAuthority(uri.authority);
  }
  result += uri.path;
  if (uri.query !== null) {
    result += "?" + uri.query;
  }
  if (uri.fragment !== null) {
    result += "#" + uri.fragment;
  }
  return result;
}

// ===========================================================================
// RFC 3986, section 5.2.2, except that an empty reference resolves to the
// directory of the base rather than to the base itself. Absolute references
// are returned untouched: dot segments in them are left to the canonicalizer.
export function resolveUri(ref: UriReference, base: UriReference): UriReference {
  if (ref.scheme !== null) {
    return ref;
  }

  if (ref.authority !== null) {
    return {
      ...ref,
      scheme: base.scheme,
      path: removeDotSegments(ref.path),
    };
  }

  const target: UriReference = {
    scheme: base.scheme,
    authority: base.authority,
    path: "",
    query: ref.query,
    fragment: ref.fragment,
  };

  if (ref.path === "") {
    if (ref.query === null && ref.fragment === null) {
      target.path = base.path.slice(0, base.path.lastIndexOf("/") + 1);
    } else {
      target.path = base.path;
      if (ref.query === null) {
        target.query = base.query;
      }
    }
  } else if (ref.path.startsWith("/")) {
    target.path = removeDotSegments(ref.path);
  } else {
    target.path = removeDotSegments(mergePaths(base, ref.path));
  }

  return target;
}

function mergePaths(base: UriReference, refPath: string) {
  if (base.authority !== null && base.path === "") {
    return "/" + refPath;
  }
  return base.path.slice(0, base.path.lastIndexOf("/") + 1) + refPath;
}

// RFC 3986, section 5.2.4
export function removeDotSegments(path: string) {
  let input = path;
  const output: string[] = [];

  while (input.length) {
    if (input.startsWith("../")) {
      input = input.slice(3);
    } else if (input.startsWith("./")) {
      input = input.slice(2);
    } else if (input.startsWith("/./")) {
      input = input.slice(2);
    } else if (input === "/.") {
      input = "/";
    } else if (input.startsWith("/../")) {
      input = input.slice(3);
      output.pop();
    } else if (input === "/..") {
      input = "/";
      output.pop();
    } else if (input === "." || input === "..") {
      input = "";
    } else {
      const next = input.indexOf("/", input.startsWith("/") ? 1 : 0);
      const end = next < 0 ? input.length : next;
      output.push(input.slice(0, end));
      input = input.slice(end);
    }
  }

  return output.join("");
}

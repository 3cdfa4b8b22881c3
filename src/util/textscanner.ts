import { InvalidArgumentError } from "./errors.js";
import { logger } from "./logger.js";

export type ScanResource = {
  url?: string | null;
  // raw Content-Type header value, eg. "text/plain; charset=UTF-8"
  contentType?: string | null;
  body?: string;
};

export type FoundUrl = {
  url: string;
  depth: number;
  sourceUrl: string | null;
};

export type FoundUrlListener = (found: FoundUrl) => void;

export type MediaType = {
  type: string;
  subtype: string;
};

const ANCHOR_HTTP = "http://";
const ANCHOR_HTTPS = "https://";

const CLOSING_DELIMITERS: Record<string, string> = {
  "'": "'",
  '"': '"',
  "<": ">",
  "(": ")",
  "[": "]",
  "{": "}",
};

const WHITESPACE_RX = /\s/;

// ===========================================================================
export function parseMediaType(contentType?: string | null): MediaType | null {
  if (!contentType) {
    return null;
  }
  const mime = contentType.split(";")[0].trim().toLowerCase();
  const slash = mime.indexOf("/");
  if (slash <= 0) {
    return null;
  }
  return { type: mime.slice(0, slash), subtype: mime.slice(slash + 1) };
}

function startsWithIgnoreCase(text: string, start: number, anchor: string) {
  if (start + anchor.length > text.length) {
    return false;
  }
  for (let i = 0; i < anchor.length; i++) {
    if (text[start + i].toLowerCase() !== anchor[i]) {
      return false;
    }
  }
  return true;
}

function anchorLengthAt(text: string, pos: number) {
  if (startsWithIgnoreCase(text, pos, ANCHOR_HTTP)) {
    return ANCHOR_HTTP.length;
  }
  if (startsWithIgnoreCase(text, pos, ANCHOR_HTTPS)) {
    return ANCHOR_HTTPS.length;
  }
  return 0;
}

// lowercase scheme and host, keeping userinfo, port, path and query as found,
// null when there is no authority
export function foldSchemeAndHost(
  match: string,
  anchorLength: number,
): string | null {
  const scheme = match.slice(0, anchorLength).toLowerCase();
  const rest = match.slice(anchorLength);

  let authorityEnd = rest.search(/[/?]/);
  if (authorityEnd < 0) {
    authorityEnd = rest.length;
  }

  const authority = rest.slice(0, authorityEnd);
  if (!authority) {
    return null;
  }

  let tail = rest.slice(authorityEnd);
  if (!tail.startsWith("/")) {
    tail = "/" + tail;
  }

  const at = authority.lastIndexOf("@");
  const userinfo = authority.slice(0, at + 1);
  const hostPort = authority.slice(at + 1);

  return scheme + userinfo + hostPort.toLowerCase() + tail;
}

// ===========================================================================
export class TextUrlScanner {
  listeners: FoundUrlListener[] = [];
  // urls reported by the latest scan
  count = 0;

  addListener(listener: FoundUrlListener) {
    this.listeners.push(listener);
  }

  removeListener(listener: FoundUrlListener) {
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  // pathHint is part of the parser contract but plays no part here
  canScan(
    resource: ScanResource | null | undefined,
    pathHint: string | null,
    alreadyClaimed: boolean,
  ): boolean {
    if (!resource) {
      throw new InvalidArgumentError("resource is required");
    }

    if (alreadyClaimed) {
      return false;
    }

    const mediaType = parseMediaType(resource.contentType);
    if (!mediaType || mediaType.type !== "text") {
      return false;
    }

    return mediaType.subtype !== "html";
  }

  // Reports every http(s) URL in the body to the listeners. Never claims the
  // resource, so always returns false.
  scan(
    resource: ScanResource | null | undefined,
    body: string | null,
    depth: number,
  ): boolean {
    if (!resource) {
      throw new InvalidArgumentError("resource is required");
    }

    const text = body ?? resource.body ?? "";

    const sourceUrl = resource.url ?? null;
    this.count = 0;
    let pos = 0;

    while (pos < text.length) {
      const anchorLength = anchorLengthAt(text, pos);
      if (!anchorLength) {
        pos++;
        continue;
      }

      const closer = pos > 0 ? CLOSING_DELIMITERS[text[pos - 1]] : undefined;

      let end = pos + anchorLength;
      while (
        end < text.length &&
        text[end] !== closer &&
        !WHITESPACE_RX.test(text[end])
      ) {
        end++;
      }

      let match = text.slice(pos, end);
      pos = end;

      const hash = match.indexOf("#");
      if (hash >= 0) {
        match = match.slice(0, hash);
      }

      const url = foldSchemeAndHost(match, anchorLength);
      if (!url) {
        continue;
      }

      this.emitFound({ url, depth: depth + 1, sourceUrl });
    }

    logger.debug(
      "Text scan done",
      { sourceUrl, found: this.count, depth },
      "links",
    );

    return false;
  }

  emitFound(found: FoundUrl) {
    this.count++;
    for (const listener of this.listeners) {
      listener(found);
    }
  }
}

import { ParameterHandling } from "./constants.js";

// record-call style segment, eg. Book(1) or Book(title='dummy',year=2012)
const STRUCTURED_SEGMENT_RX = /^([\w%]*)\((.*)\)$/;

// not a literal: no quote, no leading digit
const KEY_NAME_RX = /^[A-Za-z_%][\w%]*$/;

// split on commas that are not inside a single-quoted value
function splitArgs(args: string): string[] {
  const parts: string[] = [];
  let inQuote = false;
  let start = 0;

  for (let i = 0; i < args.length; i++) {
    const ch = args[i];
    if (ch === "'") {
      inQuote = !inQuote;
    } else if (ch === "," && !inQuote) {
      parts.push(args.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(args.slice(start));

  return parts;
}

export function cleanStructuredSegment(
  segment: string,
  mode: ParameterHandling,
): string {
  const m = segment.match(STRUCTURED_SEGMENT_RX);
  if (!m || mode === ParameterHandling.UseAll) {
    return segment;
  }

  const [, name, args] = m;

  if (mode === ParameterHandling.IgnoreCompletely) {
    return `${name}()`;
  }

  const parts = splitArgs(args);

  if (parts.length === 1 && keyOf(parts[0]) === null) {
    // a single unnamed literal carries no keys, a lone key name is already
    // in its cleaned form
    return KEY_NAME_RX.test(args) ? segment : `${name}()`;
  }

  const keys = parts.map(keyOf);
  if (keys.every((k): k is string => k !== null && KEY_NAME_RX.test(k))) {
    return `${name}(${keys.join(",")})`;
  }

  // a list of keys, or anything not made only of key=value pairs, stays
  return segment;
}

function keyOf(part: string): string | null {
  const eq = part.indexOf("=");
  if (eq < 0 || isQuotedBefore(part, eq)) {
    return null;
  }
  return part.slice(0, eq);
}

// "=" inside a quoted literal, eg. Book('a=b'), is not a key separator
function isQuotedBefore(part: string, index: number) {
  return part.slice(0, index).includes("'");
}

export function cleanStructuredPath(path: string, mode: ParameterHandling) {
  if (mode === ParameterHandling.UseAll) {
    return path;
  }
  return path
    .split("/")
    .map((segment) => cleanStructuredSegment(segment, mode))
    .join("/");
}

import { InvalidArgumentError } from "../src/util/errors.js";
import {
  FoundUrl,
  ScanResource,
  TextUrlScanner,
  parseMediaType,
} from "../src/util/textscanner.js";

const ROOT_PATH = "/";
const BASE_DEPTH = 0;

function resourceWith(contentType: string, body = ""): ScanResource {
  return { contentType: contentType + "; charset=UTF-8", body };
}

function body(...lines: string[]) {
  return lines.join("\n");
}

function scannerWithListener() {
  const scanner = new TextUrlScanner();
  const found: FoundUrl[] = [];
  scanner.addListener((f) => found.push(f));
  return { scanner, found };
}

test("fail to evaluate an undefined resource", () => {
  const scanner = new TextUrlScanner();
  expect(() => scanner.canScan(null, ROOT_PATH, false)).toThrow(
    InvalidArgumentError,
  );
});

test("do not scan a resource already claimed", () => {
  const scanner = new TextUrlScanner();
  expect(scanner.canScan(resourceWith("text/xyz"), ROOT_PATH, true)).toBe(false);
});

test("do not scan non-text resources", () => {
  const scanner = new TextUrlScanner();
  expect(scanner.canScan(resourceWith("application/xyz"), ROOT_PATH, false)).toBe(
    false,
  );
  expect(scanner.canScan({ body: "" }, ROOT_PATH, false)).toBe(false);
});

test("do not scan html resources", () => {
  const scanner = new TextUrlScanner();
  expect(scanner.canScan(resourceWith("text/html"), ROOT_PATH, false)).toBe(false);
  expect(scanner.canScan(resourceWith("TEXT/HTML"), ROOT_PATH, false)).toBe(false);
});

test("scan text resources", () => {
  const scanner = new TextUrlScanner();
  expect(scanner.canScan(resourceWith("text/xyz"), ROOT_PATH, false)).toBe(true);
  expect(scanner.canScan(resourceWith("text/html-ish"), ROOT_PATH, false)).toBe(
    true,
  );
});

test("scan text resources even if path hint is null", () => {
  const scanner = new TextUrlScanner();
  expect(scanner.canScan(resourceWith("text/xyz"), null, false)).toBe(true);
});

test("fail to scan an undefined resource", () => {
  const scanner = new TextUrlScanner();
  expect(() => scanner.scan(undefined, "", BASE_DEPTH)).toThrow(
    InvalidArgumentError,
  );
});

test("never consider resource completely parsed", () => {
  const scanner = new TextUrlScanner();
  expect(
    scanner.scan(resourceWith("text/xyz"), "Non Empty Body...", BASE_DEPTH),
  ).toBe(false);
});

test("find no urls if there are none", () => {
  const { scanner, found } = scannerWithListener();

  const completelyParsed = scanner.scan(
    resourceWith("text/xyz"),
    body(
      "Body with no HTTP/S URLs",
      " ://example.com/ ",
      "More text...  ftp://ftp.example.com/ ",
      "Even more text... //noscheme.example.com ",
    ),
    BASE_DEPTH,
  );

  expect(completelyParsed).toBe(false);
  expect(scanner.count).toBe(0);
  expect(found).toEqual([]);
});

test("find delimited urls in plain text", () => {
  const { scanner, found } = scannerWithListener();

  const completelyParsed = scanner.scan(
    resourceWith("text/xyz"),
    body(
      "Body with HTTP/S URLs",
      " - http://plaincomment.example.com some text not part of URL",
      '- "https://plaincomment.example.com/z.php?x=y" more text not part of URL',
      "- 'http://plaincomment.example.com/c.pl?x=y' even more text not part of URL",
      "- <https://plaincomment.example.com/d.asp?x=y> ...",
      "- http://plaincomment.example.com/e/e1/e2.html?x=y#stop fragment should be ignored",
      "- (https://plaincomment.example.com/surrounded/with/parenthesis) parenthesis should not be included",
      "- [https://plaincomment.example.com/surrounded/with/brackets] brackets should not be included",
      "- {https://plaincomment.example.com/surrounded/with/curly/brackets} curly brackets should not be included",
      "- mixed case URLs HtTpS://ExAmPlE.CoM/path/ should also be found",
    ),
    BASE_DEPTH,
  );

  expect(completelyParsed).toBe(false);
  expect(scanner.count).toBe(9);
  expect(found.map((f) => f.url)).toEqual([
    "http://plaincomment.example.com/",
    "https://plaincomment.example.com/z.php?x=y",
    "http://plaincomment.example.com/c.pl?x=y",
    "https://plaincomment.example.com/d.asp?x=y",
    "http://plaincomment.example.com/e/e1/e2.html?x=y",
    "https://plaincomment.example.com/surrounded/with/parenthesis",
    "https://plaincomment.example.com/surrounded/with/brackets",
    "https://plaincomment.example.com/surrounded/with/curly/brackets",
    "https://example.com/path/",
  ]);
});

test("found urls carry next depth and source url", () => {
  const { scanner, found } = scannerWithListener();

  scanner.scan(
    { url: "https://example.com/notes.txt", contentType: "text/plain" },
    "see http://example.com/a",
    2,
  );

  expect(found).toEqual([
    {
      url: "http://example.com/a",
      depth: 3,
      sourceUrl: "https://example.com/notes.txt",
    },
  ]);
});

test("scan resource body when no body is given", () => {
  const { scanner, found } = scannerWithListener();

  scanner.scan(
    { contentType: "text/plain", body: "see http://example.com/x" },
    null,
    BASE_DEPTH,
  );

  expect(found).toEqual([
    { url: "http://example.com/x", depth: 1, sourceUrl: null },
  ]);
});

test("fold only scheme and host", () => {
  const { scanner, found } = scannerWithListener();

  scanner.scan(
    resourceWith("text/plain"),
    body(
      "HTTP://Example.COM/Some/Path?Q=V",
      "http://User:Pw@Host.EXAMPLE.com:8080/X",
      "http://Example.com?a=B",
    ),
    BASE_DEPTH,
  );

  expect(found.map((f) => f.url)).toEqual([
    "http://example.com/Some/Path?Q=V",
    "http://User:Pw@host.example.com:8080/X",
    "http://example.com/?a=B",
  ]);
});

test("closing delimiter applies only after its opening delimiter", () => {
  const { scanner, found } = scannerWithListener();

  scanner.scan(
    resourceWith("text/plain"),
    body("'http://example.com/a b", "xhttp://example.com/b) c"),
    BASE_DEPTH,
  );

  expect(found.map((f) => f.url)).toEqual([
    "http://example.com/a",
    "http://example.com/b)",
  ]);
});

test("url inside a found url is not reported again", () => {
  const { scanner, found } = scannerWithListener();

  scanner.scan(
    resourceWith("text/plain"),
    "go to http://a.example.com/?next=http://b.example.com/ now",
    BASE_DEPTH,
  );

  expect(found.map((f) => f.url)).toEqual([
    "http://a.example.com/?next=http://b.example.com/",
  ]);
});

test("skip anchors without authority", () => {
  const { scanner, found } = scannerWithListener();

  scanner.scan(
    resourceWith("text/plain"),
    "http:// and https://#top and HTTP://",
    BASE_DEPTH,
  );

  expect(found).toEqual([]);
  expect(scanner.count).toBe(0);
});

test("count covers only the latest scan", () => {
  const { scanner, found } = scannerWithListener();

  scanner.scan(resourceWith("text/plain"), "http://one.example.com/", BASE_DEPTH);
  scanner.scan(resourceWith("text/plain"), "http://two.example.com/", BASE_DEPTH);

  expect(scanner.count).toBe(1);
  expect(found.map((f) => f.url)).toEqual([
    "http://one.example.com/",
    "http://two.example.com/",
  ]);

  scanner.scan(resourceWith("text/plain"), "no links", BASE_DEPTH);
  expect(scanner.count).toBe(0);
});

test("every listener receives every url in order", () => {
  const scanner = new TextUrlScanner();
  const first: string[] = [];
  const second: string[] = [];
  scanner.addListener((f) => first.push(f.url));
  scanner.addListener((f) => second.push(f.url));

  scanner.scan(
    resourceWith("text/plain"),
    "http://one.example.com/ https://two.example.com/",
    BASE_DEPTH,
  );

  const expected = ["http://one.example.com/", "https://two.example.com/"];
  expect(first).toEqual(expected);
  expect(second).toEqual(expected);
});

test("removed listener receives nothing", () => {
  const scanner = new TextUrlScanner();
  const received: string[] = [];
  const listener = (f: FoundUrl) => received.push(f.url);
  scanner.addListener(listener);
  scanner.removeListener(listener);

  scanner.scan(resourceWith("text/plain"), "http://example.com/", BASE_DEPTH);

  expect(received).toEqual([]);
  expect(scanner.count).toBe(1);
});

test("parseMediaType", () => {
  expect(parseMediaType("Text/Plain; charset=UTF-8")).toEqual({
    type: "text",
    subtype: "plain",
  });
  expect(parseMediaType("text")).toBe(null);
  expect(parseMediaType(null)).toBe(null);
});

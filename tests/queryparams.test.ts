import { ParameterHandling } from "../src/util/constants.js";
import {
  cleanQueryParams,
  formatQuery,
  parseQuery,
  sortParams,
} from "../src/util/queryparams.js";

const keepAll = () => false;

test("parse query into names and values", () => {
  expect(parseQuery("a=1&&b&c=&=d&e=f=g")).toEqual([
    { name: "a", value: "1" },
    { name: "b", value: null },
    { name: "c", value: "" },
    { name: "", value: "d" },
    { name: "e", value: "f=g" },
  ]);
});

test("format query keeps bare names bare", () => {
  expect(formatQuery(parseQuery("b&a=&c=1"))).toBe("b&a=&c=1");
});

test("sort params by name then value, byte-wise", () => {
  const sorted = sortParams(parseQuery("b=2&B=1&a=2&a=10&a"));
  expect(formatQuery(sorted)).toBe("B=1&a&a=10&a=2&b=2");
});

test("use all keeps order and removes excluded names", () => {
  const params = parseQuery("z=1&sid=2&a=3&z=0");
  const cleaned = cleanQueryParams(
    params,
    ParameterHandling.UseAll,
    (name) => name === "sid",
  );
  expect(formatQuery(cleaned)).toBe("z=1&a=3&z=0");
});

test("ignore value keeps unique sorted names", () => {
  const params = parseQuery("z=1&sid=2&a=3&z=0");
  const cleaned = cleanQueryParams(
    params,
    ParameterHandling.IgnoreValue,
    (name) => name === "sid",
  );
  expect(formatQuery(cleaned)).toBe("a&z");
});

test("ignore value drops empty names", () => {
  const cleaned = cleanQueryParams(
    parseQuery("=x&a=1&="),
    ParameterHandling.IgnoreValue,
    keepAll,
  );
  expect(cleaned).toEqual([{ name: "a", value: null }]);
  expect(formatQuery(cleaned)).toBe("a");
});

test("ignore completely drops all params", () => {
  expect(
    cleanQueryParams(parseQuery("a=1&b=2"), ParameterHandling.IgnoreCompletely, keepAll),
  ).toEqual([]);
});

import { ParameterHandling } from "./constants.js";

export type QueryParam = {
  name: string;
  // null for a bare name, "" for "name="
  value: string | null;
};

export type ParamFilter = (name: string) => boolean;

// ===========================================================================
// only the literal "&" and "=" separate, "%26" and "%3D" stay inside the
// name or value they were found in
export function parseQuery(query: string): QueryParam[] {
  const params: QueryParam[] = [];

  for (const part of query.split("&")) {
    if (!part) {
      continue;
    }
    const eq = part.indexOf("=");
    if (eq < 0) {
      params.push({ name: part, value: null });
    } else {
      params.push({ name: part.slice(0, eq), value: part.slice(eq + 1) });
    }
  }

  return params;
}

export function formatQuery(params: QueryParam[]) {
  return params
    .map(({ name, value }) => (value === null ? name : `${name}=${value}`))
    .join("&");
}

function compareStrings(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}

// by name, then value, a bare name first
export function compareParams(a: QueryParam, b: QueryParam) {
  const byName = compareStrings(a.name, b.name);
  if (byName !== 0) {
    return byName;
  }
  if (a.value === b.value) {
    return 0;
  }
  if (a.value === null) {
    return -1;
  }
  if (b.value === null) {
    return 1;
  }
  return compareStrings(a.value, b.value);
}

export function sortParams(params: QueryParam[]) {
  return [...params].sort(compareParams);
}

// ===========================================================================
export function cleanQueryParams(
  params: QueryParam[],
  mode: ParameterHandling,
  isExcluded: ParamFilter,
): QueryParam[] {
  switch (mode) {
    case ParameterHandling.IgnoreCompletely:
      return [];

    case ParameterHandling.IgnoreValue: {
      const names = new Set<string>();
      for (const { name } of params) {
        // an empty bare name would format to a stray "&"
        if (name && !isExcluded(name)) {
          names.add(name);
        }
      }
      return [...names]
        .sort(compareStrings)
        .map((name) => ({ name, value: null }));
    }

    case ParameterHandling.UseAll:
      return params.filter(({ name }) => !isExcluded(name));
  }
}

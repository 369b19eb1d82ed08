import type { HeaderMap, HeaderValue } from "./types.js";

export const ABSENT: HeaderValue = { kind: "absent" };

/** absent → single → multi; multi grows. Never mutates `value`. */
export function appendHeaderToken(
  value: HeaderValue,
  token: string,
): HeaderValue {
  switch (value.kind) {
    case "absent":
      return { kind: "single", value: token };
    case "single":
      return { kind: "multi", values: [value.value, token] };
    case "multi":
      return { kind: "multi", values: [...value.values, token] };
  }
}

export function headerValueList(value: HeaderValue): string[] {
  switch (value.kind) {
    case "absent":
      return [];
    case "single":
      return [value.value];
    case "multi":
      return [...value.values];
  }
}

export function mergeHeaderValues(
  previous: HeaderValue,
  next: HeaderValue,
): HeaderValue {
  let merged = previous;
  for (const token of headerValueList(next)) {
    merged = appendHeaderToken(merged, token);
  }
  return merged;
}

/** Wire form of a value: list items joined by ", ", absent as "". */
export function formatHeaderValue(value: HeaderValue): string {
  return headerValueList(value).join(", ");
}

/**
 * Look up a header by name, ignoring ASCII case. An exact-case entry is
 * preferred; otherwise the first spelling received wins.
 */
export function getHeader(
  headers: HeaderMap,
  name: string,
): HeaderValue | undefined {
  const exact = headers.get(name);
  if (exact) return exact;

  const wanted = name.toLowerCase();
  for (const [key, value] of headers) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

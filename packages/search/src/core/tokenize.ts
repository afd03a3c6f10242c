/**
 * Lower-cased terms of `text`: split on anything that is not a letter or a
 * digit, single characters dropped.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 1);
}

/**
 * Lower-cased segments of an identifier, split at underscores, dashes, dots
 * and camel-case humps: `parseHTTPResponse_v2` gives
 * `["parse", "http", "response", "v2"]`.
 */
export function nameSegments(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .split(/[^\p{L}\p{N}]+/u)
    .map((segment) => segment.toLowerCase())
    .filter((segment) => segment !== "");
}

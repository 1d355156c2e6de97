/**
 * Cache Key Generation
 *
 * Keys are a pure function of the URL and its query parameters:
 * - parameter names and values are trimmed
 * - empty values are dropped
 * - parameters are sorted by name, then value
 *
 * Example:
 * - Input: ("https://tabelog.com/tokyo/rstLst/", [["sk", " 寿司 "], ["SrtT", "rt"]])
 * - Output: "v1:GET https://tabelog.com/tokyo/rstLst/?SrtT=rt&sk=%E5%AF%BF%E5%8F%B8"
 */

export type QueryParams = ReadonlyArray<readonly [string, string]>;

const KEY_VERSION = 'v1';

export function normalizeParams(params: QueryParams): Array<[string, string]> {
  return params
    .map(([name, value]): [string, string] => [name.trim(), value.trim()])
    .filter(([name, value]) => name.length > 0 && value.length > 0)
    .sort(([aName, aValue], [bName, bValue]) =>
      aName === bName ? compare(aValue, bValue) : compare(aName, bName)
    );
}

export function buildCacheKey(url: string, params: QueryParams): string {
  const query = new URLSearchParams(normalizeParams(params)).toString();
  return `${KEY_VERSION}:GET ${url}${query ? `?${query}` : ''}`;
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

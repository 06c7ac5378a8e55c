export type QueryValue =
  | string
  | number
  | boolean
  | readonly (string | number)[]
  | null
  | undefined;

export type QueryParams = Record<string, QueryValue>;

/**
 * Encode query parameters, leaving out empty values ('', 0, false, [], null).
 * Keys are sorted; repeated values of an array keep their order.
 */
export function buildQuery(params: QueryParams): string {
  const searchParams = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null || value === '' || value === 0 || value === false) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        searchParams.append(key, String(item));
      }
      continue;
    }
    searchParams.append(key, String(value));
  }

  searchParams.sort();
  return searchParams.toString();
}

/**
 * Append encoded query parameters to a path
 */
export function withQuery(path: string, params: QueryParams): string {
  const query = buildQuery(params);
  if (!query) {
    return path;
  }
  return path.includes('?') ? `${path}&${query}` : `${path}?${query}`;
}

import {API_VERSION_PREFIX} from './contracts';

export type QueryParamValue = string | number | boolean | null | undefined;
export type QueryParams = Record<string, QueryParamValue | QueryParamValue[]>;

export type RequestTarget = {
  path: string;
  queryString: string;
};

/** Plain string-prefix check: `/v30/items` already counts as versioned. */
export const applyApiVersionPrefix = (path: string): string => {
  const rooted = path.startsWith('/') ? path : `/${path}`;
  return rooted.startsWith(API_VERSION_PREFIX) ? rooted : `${API_VERSION_PREFIX}${rooted}`;
};

export const encodeQueryParams = (params: QueryParams): string => {
  const search = new URLSearchParams();
  for (const [key, rawValue] of Object.entries(params)) {
    const values: QueryParamValue[] = Array.isArray(rawValue) ? rawValue : [rawValue];
    for (const value of values) {
      if (value === null || value === undefined) {
        continue;
      }

      search.append(key, String(value));
    }
  }

  return search.toString();
};

export const mergeQueryString = (queryString: string, params?: QueryParams): string => {
  const base = queryString.startsWith('?') ? queryString.slice(1) : queryString;
  const additional = params ? encodeQueryParams(params) : '';

  if (base && additional) {
    return `${base}&${additional}`;
  }

  return base || additional;
};

/**
 * Splits a caller path that may carry its own query string, prefixes the
 * API version segment and merges structured params into the query.
 */
export const resolveRequestTarget = ({path, params}: {path: string; params?: QueryParams}): RequestTarget => {
  const withoutFragment = path.split('#', 1)[0] ?? '';
  const queryIndex = withoutFragment.indexOf('?');
  const rawPath = queryIndex === -1 ? withoutFragment : withoutFragment.slice(0, queryIndex);
  const rawQuery = queryIndex === -1 ? '' : withoutFragment.slice(queryIndex + 1);

  return {
    path: applyApiVersionPrefix(rawPath),
    queryString: mergeQueryString(rawQuery, params)
  };
};

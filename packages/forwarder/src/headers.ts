import {err, ok, type SigningClientResult} from './errors';

const HTTP_HEADER_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const COOKIE_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

export const TRANSPORT_CONTENT_TYPE = 'text/plain';

export const normalizeHeaderName = (name: string): SigningClientResult<string> => {
  const normalizedName = name.trim().toLowerCase();
  if (!HTTP_HEADER_NAME_REGEX.test(normalizedName)) {
    return err('invalid_header_name', `Invalid header name: ${name}`);
  }

  return ok(normalizedName);
};

export const validateHeaderValue = (value: string): SigningClientResult<string> => {
  if (/[\r\n]/u.test(value)) {
    return err('invalid_header_value', 'Header values must not contain CR or LF');
  }

  return ok(value.trim());
};

export const serializeCookies = (cookies: Record<string, string>): SigningClientResult<string> => {
  const pairs: string[] = [];
  for (const [name, value] of Object.entries(cookies)) {
    if (!COOKIE_NAME_REGEX.test(name)) {
      return err('invalid_header_value', `Invalid cookie name: ${name}`);
    }

    if (/[\r\n;]/u.test(value)) {
      return err('invalid_header_value', `Cookie ${name} contains a forbidden character`);
    }

    pairs.push(`${name}=${value}`);
  }

  return ok(pairs.join('; '));
};

/**
 * Builds the transport headers: `content-type: text/plain` always wins, caller
 * headers are lower-cased and merged, and cookies become one `cookie` header
 * appended to any the caller sent.
 */
export const buildTransportHeaders = ({
  headers,
  cookies
}: {
  headers?: Record<string, string>;
  cookies?: Record<string, string>;
}): SigningClientResult<Record<string, string>> => {
  const transportHeaders: Record<string, string> = {};

  for (const [name, value] of Object.entries(headers ?? {})) {
    const normalizedName = normalizeHeaderName(name);
    if (!normalizedName.ok) {
      return normalizedName;
    }

    if (normalizedName.value === 'content-type') {
      continue;
    }

    const normalizedValue = validateHeaderValue(value);
    if (!normalizedValue.ok) {
      return normalizedValue;
    }

    transportHeaders[normalizedName.value] = normalizedValue.value;
  }

  if (cookies && Object.keys(cookies).length > 0) {
    const cookieHeader = serializeCookies(cookies);
    if (!cookieHeader.ok) {
      return cookieHeader;
    }

    const existing = transportHeaders.cookie;
    transportHeaders.cookie = existing ? `${existing}; ${cookieHeader.value}` : cookieHeader.value;
  }

  transportHeaders['content-type'] = TRANSPORT_CONTENT_TYPE;
  return ok(transportHeaders);
};

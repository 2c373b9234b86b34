/**
 * Join a configured backend base URL with an API path. Trailing slashes on the
 * base are dropped so `http://host/` and `http://host` behave the same.
 */
export function joinBackendUrl(baseUrl: string, path: string): string {
  const base = baseUrl.replace(/\/+$/, '')
  const suffix = path.startsWith('/') ? path : `/${path}`
  return `${base}${suffix}`
}

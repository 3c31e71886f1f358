export interface CookiePair {
  name: string
  value: string
}

/**
 * Serialize cookies as a Cookie request header value, in the given order
 */
export function formatCookies(cookies: readonly CookiePair[]): string {
  return cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ')
}

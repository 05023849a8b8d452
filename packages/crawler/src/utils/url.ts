const HTTP_PROTOCOLS = new Set(['http:', 'https:'])

/**
 * Canonical form used for frontier dedup: absolute http(s) URL without its
 * fragment. The path is kept as written, trailing slash included, since
 * `/docs/` and `/docs` resolve relative links differently. Returns undefined
 * for anything that is not a crawlable http(s) link.
 */
export const normalizeUrl = (raw: string, base?: string): string | undefined => {
  const trimmed = raw.trim()
  if (trimmed.length === 0) {
    return undefined
  }

  let parsed: URL
  try {
    parsed = base === undefined ? new URL(trimmed) : new URL(trimmed, base)
  } catch {
    return undefined
  }

  if (!HTTP_PROTOCOLS.has(parsed.protocol)) {
    return undefined
  }

  parsed.hash = ''

  return parsed.toString()
}

/** Network authority (`host[:port]`), lowercased by the URL parser. */
export const authorityOf = (url: string): string | undefined => {
  try {
    return new URL(url).host
  } catch {
    return undefined
  }
}

export const sameAuthority = (url: string, target: string): boolean => {
  const authority = authorityOf(url)
  return authority !== undefined && authority === authorityOf(target)
}

export const originOf = (url: string): string | undefined => {
  try {
    return new URL(url).origin
  } catch {
    return undefined
  }
}

export const isValidUrl = (url: string): boolean => {
  try {
    new URL(url)
    return true
  } catch {
    return false
  }
}

export const hasUriScheme = (value: string): boolean => /^[a-z][a-z0-9+.-]*:\/\//i.test(value)

/** Trimmed, non-blank URLs in first-seen order, each once. */
export const uniqueUrls = (urls: readonly string[]): string[] => [
  ...new Set(urls.map(url => url.trim()).filter(url => url.length > 0))
]

import { log } from '@ldes-harvester/logger'

/**
 * Resolves a relation target against the page it was found on. Returns
 * undefined for anything that does not end up as an absolute http(s) URL.
 */
export const resolveHttpUrl = (candidate: string, base?: string): string | undefined => {
  try {
    const url = base ? new URL(candidate, base) : new URL(candidate)
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      log.warn('Ignoring non-HTTP relation target', { candidate, base })
      return undefined
    }

    return url.toString()
  } catch {
    log.warn('Ignoring malformed relation target', { candidate, base })
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

export const isHttpUrl = (url: string): boolean => {
  return isValidUrl(url) && /^https?:$/.test(new URL(url).protocol)
}

import path from 'path'

import {
  PathDerivationError,
  UrlParseError,
} from '../errors/census-metadata.errors.js'

export interface CachePath {
  /** Directory holding the cached file. */
  dir: string
  /** Last URL path segment, extension included. */
  file: string
  /** `dir` joined with `file`. */
  path: string
}

export function parseUrl(url: string | URL): URL {
  if (url instanceof URL) return url

  try {
    return new URL(url)
  } catch (error) {
    throw new UrlParseError(url, { cause: error })
  }
}

/**
 * Maps a URL onto a file under `baseDir` that mirrors the URL's path, e.g.
 * `https://api.census.gov/data/2020/acs/acs5/variables.json` becomes
 * `<baseDir>/data/2020/acs/acs5/variables.json`.
 */
export function cachePathFromUrl(url: string | URL, baseDir: string): CachePath {
  const parsed = parseUrl(url)

  // Opaque URLs such as `mailto:` have no hierarchical path.
  if (!parsed.pathname.startsWith('/')) {
    throw new PathDerivationError(
      `Provided URL '${parsed.href}' does not have path segments`,
    )
  }

  const segments = parsed.pathname.slice(1).split('/')
  const file = segments.pop() ?? ''

  if (file === '') {
    throw new PathDerivationError(
      `Path of URL '${parsed.href}' is empty. Expected the last path segment to be a file name with a period (file extension), e.g. '.json'`,
    )
  }

  if (!file.includes('.')) {
    throw new PathDerivationError(
      `Expected the last element in the URL to contain a period (file extension), e.g. '.json' or '.html' but got: '${parsed.href}'`,
    )
  }

  const dir = path.join(baseDir, ...segments)

  return { dir, file, path: path.join(dir, file) }
}

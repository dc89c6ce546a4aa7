import { promises as fs } from 'fs'

import {
  IoError,
  NetworkError,
} from '../errors/census-metadata.errors.js'
import {
  type CachePath,
  cachePathFromUrl,
  parseUrl,
} from '../helpers/cache-path.helper.js'

export interface MetadataFetcher {
  fetch(url: string | URL): Promise<string>
}

export interface CachedClientOptions {
  /** Abort requests that take longer than this many milliseconds. */
  timeoutMs?: number
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  )
}

/**
 * HTTP client that keeps every response on disk under `baseCacheDir`, laid out
 * like the URL's path. Cached files are served as is: published Census
 * metadata documents do not change, so entries never expire.
 */
export class CachedClient implements MetadataFetcher {
  private readonly timeoutMs: number

  constructor(
    private readonly baseCacheDir: string,
    options: CachedClientOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 30000
  }

  async fetch(url: string | URL): Promise<string> {
    const parsedUrl = parseUrl(url)
    const cachePath = cachePathFromUrl(parsedUrl, this.baseCacheDir)

    const cached = await this.readCache(cachePath.path)
    if (cached !== null) {
      console.log(`Using cached response for ${parsedUrl.href}`)
      return cached
    }

    const body = await this.request(parsedUrl)
    await this.writeCache(cachePath, body)

    console.log(`Cached ${parsedUrl.href} at ${cachePath.path}`)
    return body
  }

  // Readers trust any file at the final path, so the body only lands there
  // through a rename once it is fully written.
  private async writeCache(cachePath: CachePath, body: string): Promise<void> {
    const tempPath = `${cachePath.path}.${process.pid}.tmp`
    const writeError = (error: unknown) =>
      new IoError(`Failed to write cache file ${cachePath.path}`, cachePath.path, {
        cause: error,
      })

    try {
      await fs.mkdir(cachePath.dir, { recursive: true })
    } catch (error) {
      throw writeError(error)
    }

    try {
      await fs.writeFile(tempPath, body, 'utf8')
      await fs.rename(tempPath, cachePath.path)
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`Failed to remove ${tempPath}:`, cleanupError)
      })
      throw writeError(error)
    }
  }

  private async readCache(filePath: string): Promise<string | null> {
    try {
      return await fs.readFile(filePath, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return null

      throw new IoError(`Failed to read cache file ${filePath}`, filePath, {
        cause: error,
      })
    }
  }

  private async request(url: URL): Promise<string> {
    console.log(`Making API request to: ${url.href}`)

    let response: Response
    try {
      response = await fetch(url.href, {
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new NetworkError(
        `HTTP request error for ${url.href}: ${reason}`,
        url.href,
        undefined,
        { cause: error },
      )
    }

    if (!response.ok) {
      throw new NetworkError(
        `API request failed: ${response.status} ${response.statusText}`,
        url.href,
        response.status,
      )
    }

    try {
      return await response.text()
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new NetworkError(
        `Failed to read response body from ${url.href}: ${reason}`,
        url.href,
        response.status,
        { cause: error },
      )
    }
  }
}

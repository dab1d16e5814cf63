import { EMPTY_PARSE_CONTEXT, type FormatSpec } from '../formats/types.js'
import { formatMatchers, matchingFormats, tryParse, type ParseOptions } from './parser.js'
import { NOT_FOUND, type ParseResult } from './types.js'

export type FetchFunction = typeof fetch

export interface RemoteOptions extends ParseOptions {
  /** Milliseconds before the request is aborted. */
  timeout: number
  fetch?: FetchFunction
}

/**
 * Download a configuration file and parse it.
 *
 * The format comes from the last segment of the URL path: only the first
 * format matching it is tried. Network errors, timeouts, error statuses and
 * unusable content all give a not-found result.
 */
export async function fetchAndParse(
  url: string,
  formats: readonly FormatSpec[],
  options: RemoteOptions
): Promise<ParseResult> {
  const { logger } = options
  const fetchImpl = options.fetch ?? fetch

  const fileName = urlFileName(url)
  const [format] = matchingFormats(fileName, formatMatchers(formats, options.fileFlags))
  if (!format) {
    logger?.warn({ url }, 'No format matches the URL file name')
    return NOT_FOUND
  }

  let content: string
  try {
    logger?.debug({ url, timeout: options.timeout }, 'Download file from URL')
    const response = await fetchImpl(url, {
      signal: AbortSignal.timeout(options.timeout),
    })
    if (!response.ok) {
      logger?.warn(
        { url, status: response.status },
        `Can't download ${url}: ${response.statusText}`
      )
      return NOT_FOUND
    }
    content = await response.text()
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      logger?.warn({ url }, `Download timed out after ${options.timeout}ms`)
    } else {
      const message = error instanceof Error ? error.message : String(error)
      logger?.warn({ url, error: message }, `Can't download ${url}`)
    }
    return NOT_FOUND
  }

  if (content.length === 0) {
    logger?.debug({ url }, 'Downloaded file is empty')
    return NOT_FOUND
  }

  const document = tryParse(content, format, options.context ?? EMPTY_PARSE_CONTEXT, logger)
  if (!document) return NOT_FOUND

  return {
    found: true,
    document,
    source: { location: url, kind: 'url', format: format.name },
  }
}

/**
 * Last path segment of a URL, decoded: `https://host/conf/app.toml?x=1` -> `app.toml`
 */
export function urlFileName(url: string): string {
  const { pathname } = new URL(url)
  const last = pathname.split('/').filter(Boolean).pop() ?? ''
  try {
    return decodeURIComponent(last)
  } catch {
    return last
  }
}

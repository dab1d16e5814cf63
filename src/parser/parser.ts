import fs from 'fs'
import path from 'path'
import { isPlainObject } from '../config/merge.js'
import { EMPTY_PARSE_CONTEXT, type FormatSpec, type ParseContext } from '../formats/types.js'
import type { DiagnosticLogger } from '../logging/logger.js'
import { compilePattern, type CompiledPattern } from '../pattern/compiler.js'
import { defaultFileFlags, type PatternFlag } from '../pattern/flags.js'
import { NOT_FOUND, type NestedDocument, type ParseResult } from './types.js'

export interface ParseOptions {
  /** Flags used to match file names against format patterns. */
  fileFlags?: Iterable<PatternFlag>
  context?: ParseContext
  logger?: DiagnosticLogger
}

interface FormatMatcher {
  format: FormatSpec
  pattern: CompiledPattern
}

/**
 * Compile the file patterns of each format, keeping format order.
 */
export function formatMatchers(
  formats: readonly FormatSpec[],
  fileFlags: Iterable<PatternFlag> = defaultFileFlags()
): FormatMatcher[] {
  const flags = [...fileFlags]
  return formats.map((format) => ({
    format,
    pattern: compilePattern(format.patterns.join('|'), flags),
  }))
}

/**
 * Formats whose patterns match a file name, in priority order.
 */
export function matchingFormats(
  fileName: string,
  matchers: readonly FormatMatcher[]
): FormatSpec[] {
  return matchers
    .filter((matcher) => matcher.pattern.matches(fileName))
    .map((matcher) => matcher.format)
}

/**
 * A parse result is usable when it is a mapping with at least one key.
 */
export function isUsableDocument(value: unknown): value is NestedDocument {
  return isPlainObject(value) && Object.keys(value).length > 0
}

/**
 * Try one format on some content. Returns undefined when the format fails
 * or yields nothing usable.
 */
export function tryParse(
  content: string,
  format: FormatSpec,
  context: ParseContext,
  logger?: DiagnosticLogger
): NestedDocument | undefined {
  let parsed: unknown
  try {
    parsed = format.parse(content, context)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger?.debug({ format: format.name, error: message }, 'Parsing failed')
    return undefined
  }

  if (!isUsableDocument(parsed)) {
    logger?.debug(
      { format: format.name },
      'Parsing failed: expecting a non-empty mapping'
    )
    return undefined
  }

  logger?.debug({ format: format.name }, 'Parsing successful')
  return parsed
}

/**
 * Find the first candidate that parses into a usable document.
 *
 * Candidates are tried in the order given, and for each candidate the
 * formats matching its file name in priority order. Missing, empty or
 * unreadable files and failed parses are skipped. The search stops at the
 * first success.
 */
export function parseFirstMatch(
  candidates: Iterable<string>,
  formats: readonly FormatSpec[],
  options: ParseOptions = {}
): ParseResult {
  const { logger } = options
  const context = options.context ?? EMPTY_PARSE_CONTEXT
  const matchers = formatMatchers(formats, options.fileFlags)

  for (const candidate of candidates) {
    const content = readCandidate(candidate, logger)
    if (content === undefined) continue

    const matching = matchingFormats(path.basename(candidate), matchers)
    if (matching.length === 0) {
      logger?.debug({ file: candidate }, 'No format matches the file name')
      continue
    }

    logger?.debug(
      { file: candidate, formats: matching.map((format) => format.name) },
      'Parsing candidate'
    )
    for (const format of matching) {
      const document = tryParse(content, format, context, logger)
      if (document) {
        return {
          found: true,
          document,
          source: { location: candidate, kind: 'file', format: format.name },
        }
      }
    }
  }

  return NOT_FOUND
}

function readCandidate(
  file: string,
  logger?: DiagnosticLogger
): string | undefined {
  try {
    const stats = fs.statSync(file, { throwIfNoEntry: false })
    if (!stats) {
      logger?.debug({ file }, 'Skipping missing file')
      return undefined
    }
    if (!stats.isFile()) {
      logger?.debug({ file }, 'Skipping non-file')
      return undefined
    }
    if (stats.size === 0) {
      logger?.debug({ file }, 'Skipping empty file')
      return undefined
    }
    return fs.readFileSync(file, 'utf-8')
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger?.debug({ file, error: message }, 'Skipping unreadable file')
    return undefined
  }
}

import path from 'path'
import { globSync, hasMagic, type GlobOptionsWithFileTypesFalse } from 'glob'
import type { DiagnosticLogger } from '../logging/logger.js'
import { toPosix, type CompiledPattern } from '../pattern/compiler.js'

export interface LocateOptions {
  /** Directory relative rules are resolved from. */
  cwd?: string
  /** Also look for each rule's file name in every ancestor directory. */
  searchParents?: boolean
  logger?: DiagnosticLogger
}

/**
 * Check whether a location is a remote URL rather than a search pattern.
 */
export function isRemoteLocation(location: string): boolean {
  try {
    const url = new URL(location)
    return url.protocol === 'http:' || url.protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * List the files matching a compiled pattern.
 *
 * Order: rules in pattern order, then ancestors nearest first when parent
 * search is on, then absolute paths in lexical order. A file already yielded
 * is not repeated. The filesystem is read again on every iteration, and only
 * when the sequence is consumed.
 */
export function locate(
  pattern: CompiledPattern,
  options: LocateOptions = {}
): Iterable<string> {
  const cwd = options.cwd ?? process.cwd()
  const globOptions: GlobOptionsWithFileTypesFalse = {
    cwd,
    absolute: true,
    nodir: true,
    dot: pattern.has('dotglob'),
    nocase: pattern.has('ignorecase'),
    follow: pattern.has('follow'),
    noglobstar: !pattern.has('globstar'),
    nobrace: !pattern.has('brace'),
    windowsPathsNoEscape: pattern.platform === 'win32',
    withFileTypes: false,
  }

  return {
    *[Symbol.iterator]() {
      const seen = new Set<string>()

      const rules = searchRules(pattern, cwd, options.searchParents ?? false, options.logger)
      for (const rule of rules) {
        options.logger?.debug({ rule }, 'Search filesystem')
        const matches = globSync(rule, globOptions).sort(compareLexical)

        for (const file of matches) {
          if (seen.has(file)) continue
          seen.add(file)
          if (pattern.isExcluded(file)) {
            options.logger?.debug({ file }, 'Candidate excluded')
            continue
          }
          options.logger?.debug({ file }, 'Found candidate')
          yield file
        }
      }
    },
  }
}

/**
 * Expand inclusion rules with their ancestor variants.
 *
 * Only rules whose directory part is a plain path can be walked up: for
 * `/etc/app/conf/*.toml` this adds `/etc/app/*.toml`, `/etc/*.toml` and
 * `/*.toml`.
 */
export function searchRules(
  pattern: CompiledPattern,
  cwd: string,
  searchParents: boolean,
  logger?: DiagnosticLogger
): string[] {
  const rules: string[] = []
  const push = (rule: string): void => {
    if (!rules.includes(rule)) rules.push(rule)
  }

  for (const rule of pattern.includes) {
    push(rule)
    if (!searchParents) continue

    const slash = rule.lastIndexOf('/')
    const dir = slash === -1 ? '.' : rule.slice(0, slash) || '/'
    const name = rule.slice(slash + 1)
    if (hasMagic(dir, { magicalBraces: pattern.has('brace') })) {
      logger?.debug({ rule }, 'Parent search skipped: directory part is a glob')
      continue
    }

    let current = toPosix(path.resolve(cwd, dir), pattern.platform)
    for (;;) {
      const parent = path.posix.dirname(current)
      if (parent === current || parent === '.') break
      push(parent.endsWith('/') ? `${parent}${name}` : `${parent}/${name}`)
      current = parent
    }
  }

  return rules
}

function compareLexical(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

import os from 'os'
import { Minimatch, type MinimatchOptions } from 'minimatch'
import { InvalidPatternError } from '../errors.js'
import { flagSet, type FlagSet, type PatternFlag } from './flags.js'

export interface CompileOptions {
  platform?: NodeJS.Platform
  homedir?: string
}

/**
 * A search pattern split into inclusion and exclusion rules, ready to match.
 * Rules are kept with forward slashes; `native` gives them back with the
 * platform separator.
 */
export class CompiledPattern {
  private readonly includeMatchers: Minimatch[]
  private readonly excludeMatchers: Minimatch[]

  constructor(
    readonly source: string,
    readonly includes: readonly string[],
    readonly excludes: readonly string[],
    readonly flags: FlagSet,
    readonly platform: NodeJS.Platform
  ) {
    const options = minimatchOptions(flags, platform)
    this.includeMatchers = includes.map((rule) => new Minimatch(rule, options))
    // Exclusions without a slash apply to the file name wherever it lives
    this.excludeMatchers = excludes.map(
      (rule) => new Minimatch(rule, { ...options, matchBase: true })
    )
  }

  has(flag: PatternFlag): boolean {
    return this.flags.has(flag)
  }

  /**
   * Inclusion rules with the platform's native separator.
   */
  get native(): string[] {
    return this.includes.map((rule) => toNative(rule, this.platform))
  }

  /**
   * Check a path, or a bare file name, against the rules.
   * Exclusions are evaluated after every inclusion.
   */
  matches(target: string): boolean {
    const candidate = toPosix(target, this.platform)
    if (!this.includeMatchers.some((m) => m.match(candidate))) return false
    return !this.isExcluded(candidate)
  }

  isExcluded(target: string): boolean {
    const candidate = toPosix(target, this.platform)
    return this.excludeMatchers.some((m) => m.match(candidate))
  }

  toString(): string {
    return this.source
  }
}

/**
 * Compile a raw pattern such as `~/.config/app/*.{toml,yaml}|!*.bak.toml`.
 *
 * Throws InvalidPatternError on empty patterns or alternatives, unbalanced
 * braces, unterminated bracket classes, and patterns that only exclude.
 */
export function compilePattern(
  raw: string,
  flags: Iterable<PatternFlag>,
  options: CompileOptions = {}
): CompiledPattern {
  const platform = options.platform ?? process.platform
  const set = flagSet(flags)

  if (raw.trim() === '') {
    throw new InvalidPatternError('pattern is empty', raw)
  }

  // Patterns are matched with forward slashes on every platform
  const normalized = toPosix(raw, platform)
  const escapes = platform !== 'win32'

  if (set.has('brace')) checkBraces(normalized, raw, escapes)

  const alternatives = set.has('split')
    ? splitAlternatives(normalized, raw, escapes)
    : [normalized]

  const includes: string[] = []
  const excludes: string[] = []

  for (const alternative of alternatives) {
    const negated = set.has('negate') && alternative.startsWith('!')
    const body = negated ? alternative.slice(1) : alternative
    if (body === '') {
      throw new InvalidPatternError('empty exclusion rule', raw)
    }
    checkBrackets(body, raw, escapes)

    const rule = set.has('globtilde') ? expandTilde(body, options.homedir, platform) : body
    const target = negated ? excludes : includes
    if (!target.includes(rule)) target.push(rule)
  }

  if (includes.length === 0) {
    throw new InvalidPatternError('pattern has no inclusion rule', raw)
  }

  return new CompiledPattern(raw, includes, excludes, set, platform)
}

/**
 * Split on top-level pipes. Pipes inside braces or bracket classes belong
 * to the alternative.
 */
export function splitAlternatives(
  pattern: string,
  raw: string = pattern,
  escapes = true
): string[] {
  const alternatives: string[] = []
  let current = ''
  let braceDepth = 0
  let inClass = false

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i]

    if (escapes && char === '\\' && i + 1 < pattern.length) {
      current += char + pattern[i + 1]
      i++
      continue
    }

    if (inClass) {
      if (char === ']') inClass = false
    } else if (char === '[') {
      inClass = pattern.indexOf(']', i + 1) !== -1
    } else if (char === '{') {
      braceDepth++
    } else if (char === '}' && braceDepth > 0) {
      braceDepth--
    } else if (char === '|' && braceDepth === 0) {
      if (current === '') {
        throw new InvalidPatternError('empty alternative', raw)
      }
      alternatives.push(current)
      current = ''
      continue
    }

    current += char
  }

  if (current === '') {
    throw new InvalidPatternError('unterminated alternation', raw)
  }
  alternatives.push(current)

  return alternatives
}

function checkBraces(pattern: string, raw: string, escapes: boolean): void {
  let depth = 0

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i]
    if (escapes && char === '\\') {
      i++
      continue
    }
    if (char === '{') depth++
    if (char === '}') {
      depth--
      if (depth < 0) {
        throw new InvalidPatternError(`unbalanced '}' at position ${i}`, raw)
      }
    }
  }

  if (depth > 0) {
    throw new InvalidPatternError('unbalanced braces', raw)
  }
}

/**
 * Every `[` must open a class closed by a later `]`. A `]` right after the
 * opening `[` (or `[!`, `[^`) is a member of the class.
 */
function checkBrackets(pattern: string, raw: string, escapes: boolean): void {
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i]
    if (escapes && char === '\\') {
      i++
      continue
    }
    if (char !== '[') continue

    let j = i + 1
    if (pattern[j] === '!' || pattern[j] === '^') j++
    if (pattern[j] === ']') j++
    while (j < pattern.length && pattern[j] !== ']') {
      if (escapes && pattern[j] === '\\') j++
      j++
    }
    if (j >= pattern.length) {
      throw new InvalidPatternError('unterminated bracket class', raw)
    }
    i = j
  }
}

function expandTilde(
  rule: string,
  homedir: string | undefined,
  platform: NodeJS.Platform
): string {
  if (rule !== '~' && !rule.startsWith('~/')) return rule
  const home = toPosix(homedir ?? os.homedir(), platform).replace(/\/+$/, '')
  return home + rule.slice(1)
}

function minimatchOptions(flags: FlagSet, platform: NodeJS.Platform): MinimatchOptions {
  return {
    dot: flags.has('dotglob'),
    nocase: flags.has('ignorecase'),
    noglobstar: !flags.has('globstar'),
    nobrace: !flags.has('brace'),
    nonegate: true,
    nocomment: true,
    windowsPathsNoEscape: platform === 'win32',
    platform,
  }
}

export function toPosix(value: string, platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? value.replace(/\\/g, '/') : value
}

export function toNative(value: string, platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? value.replace(/\//g, '\\') : value
}

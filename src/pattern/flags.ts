/**
 * Named matching flags of a search or file pattern.
 */
export type PatternFlag =
  | 'globstar' // `**` matches any number of directories
  | 'ignorecase'
  | 'dotglob' // wildcards match names starting with a dot
  | 'negate' // `!pattern` alternatives exclude
  | 'nodir' // only regular files, always on
  | 'brace' // `{a,b}` expansion
  | 'globtilde' // leading `~` is the home directory
  | 'follow' // traverse symlinked directories
  | 'split' // `a|b` alternation

export type FlagSet = ReadonlySet<PatternFlag>

/**
 * Platforms whose default filesystems compare names case-insensitively.
 */
const CASE_INSENSITIVE_PLATFORMS: ReadonlySet<NodeJS.Platform> = new Set([
  'win32',
  'darwin',
])

export function isCaseInsensitivePlatform(
  platform: NodeJS.Platform = process.platform
): boolean {
  return CASE_INSENSITIVE_PLATFORMS.has(platform)
}

/**
 * Build a flag set. Duplicates collapse; `nodir` is always added.
 */
export function flagSet(flags: Iterable<PatternFlag>): FlagSet {
  const set = new Set<PatternFlag>(flags)
  set.add('nodir')
  return set
}

/**
 * Flags applied to search locations.
 */
export function defaultSearchFlags(
  platform: NodeJS.Platform = process.platform
): FlagSet {
  const flags: PatternFlag[] = [
    'globstar',
    'follow',
    'dotglob',
    'split',
    'globtilde',
    'brace',
    'negate',
  ]
  if (isCaseInsensitivePlatform(platform)) flags.push('ignorecase')
  return flagSet(flags)
}

/**
 * Flags applied when matching file names against format patterns.
 */
export function defaultFileFlags(
  platform: NodeJS.Platform = process.platform
): FlagSet {
  const flags: PatternFlag[] = ['split', 'negate', 'dotglob', 'brace']
  if (isCaseInsensitivePlatform(platform)) flags.push('ignorecase')
  return flagSet(flags)
}

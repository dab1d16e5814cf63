import path from 'path'
import os from 'os'

export interface AppDirOptions {
  /** On Windows, use the roaming profile (APPDATA) instead of LOCALAPPDATA. */
  roaming?: boolean
  /** Use a dot-directory in the home folder on every platform. */
  forcePosix?: boolean
  env?: Record<string, string | undefined>
  platform?: NodeJS.Platform
  homedir?: string
}

/**
 * Folder name used on POSIX systems: lowercased, spaces become dashes.
 */
export function posixAppName(name: string): string {
  return name.split(/\s+/).filter(Boolean).join('-').toLowerCase()
}

/**
 * Get the per-user configuration directory of an application.
 * Resolution order:
 * 1. forcePosix: ~/.<app-name>
 * 2. Windows: APPDATA or LOCALAPPDATA
 * 3. macOS: ~/Library/Application Support/<App Name>
 * 4. XDG_CONFIG_HOME/<app-name>, then ~/.config/<app-name>
 */
export function getAppDir(appName: string, options: AppDirOptions = {}): string {
  const env = options.env ?? process.env
  const platform = options.platform ?? process.platform
  const home = options.homedir ?? os.homedir()
  const roaming = options.roaming ?? true

  if (platform === 'win32') {
    const key = roaming ? 'APPDATA' : 'LOCALAPPDATA'
    const folder = env[key] || env.APPDATA || home
    return path.win32.join(folder, appName)
  }

  if (options.forcePosix) {
    return path.posix.join(home, `.${posixAppName(appName)}`)
  }

  if (platform === 'darwin') {
    return path.posix.join(home, 'Library', 'Application Support', appName)
  }

  const xdg = env.XDG_CONFIG_HOME || path.posix.join(home, '.config')
  return path.posix.join(xdg, posixAppName(appName))
}

/**
 * Default search location: every file pattern inside the application directory.
 */
export function defaultSearchPattern(
  appName: string,
  filePattern: string,
  options: AppDirOptions = {}
): string {
  const dir = getAppDir(appName, options).replace(/\\/g, '/')
  // A directory prefix has to be repeated on each alternative
  return filePattern
    .split('|')
    .map((pattern) => `${dir}/${pattern}`)
    .join('|')
}

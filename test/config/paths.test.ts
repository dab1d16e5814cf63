import { describe, it, expect } from 'vitest'
import { getAppDir, posixAppName, defaultSearchPattern } from '../../src/config/paths.js'

describe('posixAppName', () => {
  it('lowercases and joins words with dashes', () => {
    expect(posixAppName('My Cool  App')).toBe('my-cool-app')
  })
})

describe('getAppDir', () => {
  const home = '/home/user'

  it('returns XDG_CONFIG_HOME/<app> on Linux when set', () => {
    expect(
      getAppDir('My App', {
        platform: 'linux',
        homedir: home,
        env: { XDG_CONFIG_HOME: '/xdg' },
      })
    ).toBe('/xdg/my-app')
  })

  it('falls back to ~/.config/<app> on Linux', () => {
    expect(getAppDir('My App', { platform: 'linux', homedir: home, env: {} })).toBe(
      '/home/user/.config/my-app'
    )
  })

  it('uses Application Support on macOS', () => {
    expect(getAppDir('My App', { platform: 'darwin', homedir: home, env: {} })).toBe(
      '/home/user/Library/Application Support/My App'
    )
  })

  it('uses a dot-directory when forcing POSIX', () => {
    expect(
      getAppDir('My App', { platform: 'darwin', homedir: home, env: {}, forcePosix: true })
    ).toBe('/home/user/.my-app')
  })

  it('uses APPDATA on Windows when roaming', () => {
    expect(
      getAppDir('my-cli', {
        platform: 'win32',
        homedir: 'C:\\Users\\user',
        env: { APPDATA: 'C:\\Users\\user\\AppData\\Roaming', LOCALAPPDATA: 'C:\\Users\\user\\AppData\\Local' },
      })
    ).toBe('C:\\Users\\user\\AppData\\Roaming\\my-cli')
  })

  it('uses LOCALAPPDATA on Windows when not roaming', () => {
    expect(
      getAppDir('my-cli', {
        platform: 'win32',
        homedir: 'C:\\Users\\user',
        roaming: false,
        env: { APPDATA: 'C:\\Users\\user\\AppData\\Roaming', LOCALAPPDATA: 'C:\\Users\\user\\AppData\\Local' },
      })
    ).toBe('C:\\Users\\user\\AppData\\Local\\my-cli')
  })
})

describe('defaultSearchPattern', () => {
  it('prefixes every file pattern with the application directory', () => {
    const pattern = defaultSearchPattern('my-cli', '*.toml|*.yaml', {
      platform: 'linux',
      homedir: '/home/user',
      env: {},
    })
    expect(pattern).toBe('/home/user/.config/my-cli/*.toml|/home/user/.config/my-cli/*.yaml')
  })
})

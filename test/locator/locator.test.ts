import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { isRemoteLocation, locate, searchRules } from '../../src/locator/locator.js'
import { compilePattern } from '../../src/pattern/compiler.js'
import { defaultSearchFlags } from '../../src/pattern/flags.js'
import { memoryLogger } from '../helpers/logger.js'

const flags = defaultSearchFlags('linux')

describe('isRemoteLocation', () => {
  it('recognizes http and https URLs', () => {
    expect(isRemoteLocation('https://example.com/app.toml')).toBe(true)
    expect(isRemoteLocation('http://example.com/app.toml')).toBe(true)
  })

  it('rejects paths and other schemes', () => {
    expect(isRemoteLocation('/etc/app/*.toml')).toBe(false)
    expect(isRemoteLocation('~/.config/app.toml')).toBe(false)
    expect(isRemoteLocation('file:///etc/app.toml')).toBe(false)
  })
})

describe('locate', () => {
  let testDir: string

  beforeEach(async () => {
    testDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'strata-locate-')))
    await fs.writeFile(path.join(testDir, 'b.toml'), 'b = 1')
    await fs.writeFile(path.join(testDir, 'a.toml'), 'a = 1')
    await fs.writeFile(path.join(testDir, 'c.yaml'), 'c: 1')
  })

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true })
  })

  const file = (name: string) => path.join(testDir, name)

  it('yields matches of each rule in lexical order', () => {
    const pattern = compilePattern(`${testDir}/*.toml|${testDir}/*.yaml`, flags)
    expect([...locate(pattern)]).toEqual([file('a.toml'), file('b.toml'), file('c.yaml')])
  })

  it('follows the order of the alternatives', () => {
    const pattern = compilePattern(`${testDir}/*.yaml|${testDir}/*.toml`, flags)
    expect([...locate(pattern)]).toEqual([file('c.yaml'), file('a.toml'), file('b.toml')])
  })

  it('yields a file once', () => {
    const pattern = compilePattern(`${testDir}/*.toml|${testDir}/a.*`, flags)
    expect([...locate(pattern)]).toEqual([file('a.toml'), file('b.toml')])
  })

  it('skips excluded files', () => {
    const { logger, messages } = memoryLogger()
    const pattern = compilePattern(`${testDir}/*.toml|!b.toml`, flags)

    expect([...locate(pattern, { logger })]).toEqual([file('a.toml')])
    expect(messages()).toContain('Candidate excluded')
  })

  it('skips directories', async () => {
    await fs.mkdir(path.join(testDir, 'dir.toml'))
    const pattern = compilePattern(`${testDir}/*.toml`, flags)
    expect([...locate(pattern)]).toEqual([file('a.toml'), file('b.toml')])
  })

  it('resolves relative rules from cwd', () => {
    const pattern = compilePattern('*.yaml', flags)
    expect([...locate(pattern, { cwd: testDir })]).toEqual([file('c.yaml')])
  })

  it('matches hidden files', async () => {
    await fs.writeFile(path.join(testDir, '.hidden.yaml'), 'h: 1')
    const pattern = compilePattern(`${testDir}/*.yaml`, flags)
    expect([...locate(pattern)]).toEqual([file('.hidden.yaml'), file('c.yaml')])
  })

  it('walks nested directories with globstar', async () => {
    await fs.mkdir(path.join(testDir, 'x', 'y'), { recursive: true })
    await fs.writeFile(path.join(testDir, 'x', 'y', 'deep.yaml'), 'd: 1')
    const pattern = compilePattern(`${testDir}/**/deep.yaml`, flags)
    expect([...locate(pattern)]).toEqual([path.join(testDir, 'x', 'y', 'deep.yaml')])
  })

  it('reads the filesystem on each iteration', async () => {
    const found = locate(compilePattern(`${testDir}/*.json`, flags))
    expect([...found]).toEqual([])

    await fs.writeFile(path.join(testDir, 'late.json'), '{}')
    expect([...found]).toEqual([file('late.json')])
  })

  it('yields nothing when no file matches', () => {
    const pattern = compilePattern(`${testDir}/missing/*.toml`, flags)
    expect([...locate(pattern)]).toEqual([])
  })

  it('finds files in ancestor directories', async () => {
    const nested = path.join(testDir, 'project', 'src')
    await fs.mkdir(nested, { recursive: true })
    await fs.writeFile(path.join(testDir, 'project', 'app.yaml'), 'p: 1')

    const pattern = compilePattern(`${nested}/*.yaml`, flags)
    const found = [...locate(pattern, { searchParents: true })]

    expect(found[0]).toBe(path.join(testDir, 'project', 'app.yaml'))
    expect(found[1]).toBe(file('c.yaml'))
  })
})

describe('searchRules', () => {
  it('adds every ancestor of an absolute rule, nearest first', () => {
    const pattern = compilePattern('/etc/app/conf/*.toml', flags)
    expect(searchRules(pattern, '/', true)).toEqual([
      '/etc/app/conf/*.toml',
      '/etc/app/*.toml',
      '/etc/*.toml',
      '/*.toml',
    ])
  })

  it('resolves relative rules against cwd', () => {
    const pattern = compilePattern('*.toml', flags)
    expect(searchRules(pattern, '/srv/app', true)).toEqual(['*.toml', '/srv/*.toml', '/*.toml'])
  })

  it('leaves rules alone without parent search', () => {
    const pattern = compilePattern('/etc/app/conf/*.toml', flags)
    expect(searchRules(pattern, '/', false)).toEqual(['/etc/app/conf/*.toml'])
  })

  it('skips rules whose directory part is a glob', () => {
    const pattern = compilePattern('/etc/*/conf/*.toml', flags)
    expect(searchRules(pattern, '/', true)).toEqual(['/etc/*/conf/*.toml'])
  })

  it('does not repeat shared ancestors', () => {
    const pattern = compilePattern('/a/b/*.toml|/a/c/*.toml', flags)
    expect(searchRules(pattern, '/', true)).toEqual([
      '/a/b/*.toml',
      '/a/*.toml',
      '/*.toml',
      '/a/c/*.toml',
    ])
  })
})

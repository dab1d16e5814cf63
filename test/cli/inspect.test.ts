import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { main } from '../../src/cli/index.js'

describe('strata-inspect', () => {
  let testDir: string
  let schemaFile: string
  let output: string[]
  let errors: string[]

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'strata-cli-'))
    schemaFile = path.join(testDir, 'cli.json')
    await fs.writeFile(
      schemaFile,
      JSON.stringify({
        name: 'app',
        params: [{ name: 'flag', type: 'boolean', default: false }],
        commands: [{ name: 'sub', params: [{ name: 'count', type: 'integer', default: 1 }] }],
      })
    )

    output = []
    errors = []
    vi.spyOn(console, 'log').mockImplementation((line: string) => {
      output.push(line)
    })
    vi.spyOn(console, 'error').mockImplementation((line: string) => {
      errors.push(line)
    })
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await fs.rm(testDir, { recursive: true, force: true })
  })

  it('prints help', async () => {
    expect(await main(['--help'])).toBe(0)
    expect(output[0]).toMatch(/^strata-inspect - /)
  })

  it('requires a schema', async () => {
    expect(await main([])).toBe(2)
    expect(errors[0]).toBe('Error: --schema <file> is required')
  })

  it('prints resolved values with their source', async () => {
    const config = path.join(testDir, 'app.yaml')
    await fs.writeFile(config, 'app:\n  flag: true\n  sub:\n    count: 3\n')

    const code = await main([
      '--schema',
      schemaFile,
      '--config',
      config,
      '--',
      'sub',
      '--count',
      '7',
    ])

    expect(code).toBe(0)
    const printed: unknown = JSON.parse(output[0])
    expect(printed).toMatchObject({
      location: config,
      source: { location: config, kind: 'file', format: 'yaml' },
      strict: 'disabled',
      values: {
        'app.flag': { value: true, source: 'CONFIG_FILE' },
        'app.sub.count': { value: 7, source: 'CLI' },
      },
    })
  })

  it('skips configuration files with --no-config', async () => {
    expect(await main(['--schema', schemaFile, '--no-config'])).toBe(0)
    expect(JSON.parse(output[0])).toMatchObject({
      location: null,
      source: null,
      values: { 'app.flag': { value: false, source: 'DEFAULT' } },
    })
  })

  it('exits with 2 on strict violations', async () => {
    const config = path.join(testDir, 'app.toml')
    await fs.writeFile(config, '[app]\nunknown = 1\n')

    expect(await main(['--schema', schemaFile, '--config', config, '--strict'])).toBe(2)
    expect(errors[0]).toBe(
      "Error: Parameter 'unknown' found in configuration but not in the command schema (app.unknown)."
    )
  })

  it('exits with 1 on a malformed schema', async () => {
    await fs.writeFile(schemaFile, JSON.stringify({ name: 'my app' }))

    expect(await main(['--schema', schemaFile, '--no-config'])).toBe(1)
    expect(errors[0]).toBe(
      "Error: Invalid command definition at 'name': must not contain dots or whitespace"
    )
  })

  it('warns about unknown options', async () => {
    expect(await main(['--schema', schemaFile, '--no-config', '--', '--bogus'])).toBe(0)
    expect(errors).toEqual(['Warning: ignoring unknown option --bogus'])
  })
})

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { cleanupTestRepo, createTempDir } from '../../node/adapters/git/__tests__/test-utils'
import type { ConfigurationOverrides } from '../../node/core/config'
import { ValidationError } from '../../node/shared/errors'
import { createCli, runCli, toOverrides } from '../main'

async function parse(args: string[]): Promise<ConfigurationOverrides[]> {
  const received: ConfigurationOverrides[] = []
  const cli = createCli(async (overrides) => {
    received.push(overrides)
  })
  cli.parse(['node', 'worksync', ...args], { run: false })
  await cli.runMatchedCommand()
  return received
}

describe('toOverrides', () => {
  it('leaves unset flags to the environment', () => {
    expect(toOverrides(undefined, {})).toEqual({ dryRun: false, extraScripts: [] })
  })

  it('maps every flag', () => {
    expect(
      toOverrides('box:src', {
        dryRun: true,
        verbose: true,
        keepCommit: true,
        exec: 'make',
        cwd: '/work/repo'
      })
    ).toEqual({
      destination: 'box:src',
      dryRun: true,
      verbose: true,
      historyPolicy: 'keep-commit',
      extraScripts: ['make'],
      cwd: '/work/repo'
    })
  })
})

describe('createCli', () => {
  it('parses the destination and repeated fragments', async () => {
    const received = await parse(['../mirror', '-n', '-x', 'make', '-x', 'make test', '--keep-commit'])

    expect(received).toEqual([
      {
        destination: '../mirror',
        dryRun: true,
        historyPolicy: 'keep-commit',
        extraScripts: ['make', 'make test']
      }
    ])
  })

  it('does not run the sync for --help', async () => {
    const output = vi.spyOn(console, 'log').mockImplementation(() => {})
    const received = await parse(['--help'])

    expect(received).toEqual([])
    output.mockRestore()
  })
})

describe('runCli', () => {
  let dir: string

  beforeEach(async () => {
    dir = await createTempDir()
    vi.stubEnv('WORKSYNC_DESTINATION', '')
    vi.stubEnv('WORKSYNC_VERBOSE', '')
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
    await cleanupTestRepo(dir)
  })

  const debugCalls = (calls: unknown[][]) =>
    calls.filter(([label]) => typeof label === 'string' && label.includes('DEBUG'))

  it('prints failure details at debug level when run with -v', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})

    expect(await runCli(['node', 'worksync', '-v', '-C', dir])).toBe(1)

    const [details] = debugCalls(stderr.mock.calls)
    expect(details?.[1]).toBeInstanceOf(ValidationError)
  })

  it('prints only the message without -v', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})

    expect(await runCli(['node', 'worksync', '-C', dir])).toBe(1)

    expect(debugCalls(stderr.mock.calls)).toEqual([])
    expect(stderr).toHaveBeenCalledWith(
      expect.stringContaining('ERROR'),
      'No destination given (pass one or set WORKSYNC_DESTINATION)'
    )
  })
})

import { afterEach, describe, expect, it } from 'vitest'
import { applyGlobalOptions, createProgram } from '../program'
import { logger } from '../utils/logger'
import { captureConsole, resetLogger } from './helpers'

afterEach(() => {
  resetLogger()
})

describe('createProgram', () => {
  it('registers the deploy, plan and content-type commands', () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual(['deploy', 'plan', 'content-type'])
  })

  it('runs content-type with global --json', async () => {
    const { out } = captureConsole()
    await createProgram().parseAsync(['node', 'staticdeploy', '--json', 'content-type', 'site.css'])
    expect(JSON.parse(out[0] ?? '')).toEqual({ ok: true, rows: [{ file: 'site.css', contentType: 'text/css' }], final: true })
  })
})

describe('applyGlobalOptions', () => {
  it('switches the logger into NDJSON mode', () => {
    applyGlobalOptions({ ndjson: true })
    expect(logger.isNdjson()).toBe(true)
    expect(logger.isJsonOnly()).toBe(true)
  })

  it('forces ANSI colors with --color always', () => {
    const { out } = captureConsole()
    applyGlobalOptions({ color: 'always' })
    logger.info('ready')
    logger.success('done')
    expect(out).toEqual(['ℹ \u001b[96mready\u001b[39m', 'ℹ \u001b[32m✓ done\u001b[39m'])
  })

  it('rejects an unknown color mode', () => {
    expect(() => applyGlobalOptions({ color: 'rainbow' })).toThrow('--color must be auto, always or never (got "rainbow")')
  })
})

import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'
import { computeRedactors, DEFAULT_REDACTORS, valueToPatterns } from '../utils/redaction'
import { logger } from '../utils/logger'
import { captureConsole, makeTree, removeTree, resetLogger } from './helpers'

afterEach(() => {
  resetLogger()
})

describe('valueToPatterns', () => {
  it('skips short and trivial values', () => {
    expect(valueToPatterns('abc')).toEqual([])
    expect(valueToPatterns('true')).toEqual([])
  })

  it('covers the literal and its base64 form', () => {
    expect(valueToPatterns('test-secret').map((r) => r.source)).toEqual(['test-secret', 'dGVzdC1zZWNyZXQ='])
  })
})

describe('computeRedactors', () => {
  it('masks .env values and storage secrets in log lines', async () => {
    const root = await makeTree({ '.env': 'SECRET_TOKEN=test-secret-value\nPUBLIC_URL=https://example.test\n' })
    try {
      logger.setRedactors(await computeRedactors({ cwd: root, env: { AZURE_CLIENT_SECRET: 'test-secret' } }))
      const { out } = captureConsole()
      logger.info('token test-secret-value url https://example.test')
      logger.info('client test-secret')
      expect(out).toEqual(['ℹ token ****** url https://example.test', 'ℹ client ******'])
    } finally {
      await removeTree(root)
    }
  })

  it('reads only the files it is given', async () => {
    const root = await makeTree({ '.env': 'SECRET_TOKEN=test-secret-value\n', 'ci.env': 'OTHER=test-other-value\n' })
    try {
      const patterns = await computeRedactors({ cwd: root, envFiles: ['ci.env'], env: {} })
      expect(patterns.map((r) => r.source)).toContain('test-other-value')
      expect(patterns.map((r) => r.source)).not.toContain('test-secret-value')
    } finally {
      await removeTree(root)
    }
  })
})

describe('default redactors', () => {
  it('masks account keys and SAS signatures', () => {
    logger.setRedactors(DEFAULT_REDACTORS)
    const { out } = captureConsole()
    logger.info('DefaultEndpointsProtocol=https;AccountName=acct;AccountKey=dGVzdC1zZWNyZXQtdGVzdC1zZWNyZXQ=;EndpointSuffix=example.test')
    logger.info('https://acct.blob.example.test/$web?sv=2022-11-02&sig=abcdefghijklmnop')
    expect(out).toEqual([
      'ℹ DefaultEndpointsProtocol=https;AccountName=acct;******;EndpointSuffix=example.test',
      'ℹ https://acct.blob.example.test/$web?sv=2022-11-02******'
    ])
  })
})

import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { createScanConfig, DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT_MS, loadConfig, MAX_TIMEOUT_MS } from '../src/config.js'

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    assert.deepStrictEqual(loadConfig({}), {
      timeoutMs: DEFAULT_TIMEOUT_MS,
      concurrency: DEFAULT_CONCURRENCY,
      logLevel: 'info',
      logDir: undefined,
    })
  })

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORTSWEEP_TIMEOUT_MS: '250',
      PORTSWEEP_CONCURRENCY: '32',
      LOG_LEVEL: 'DEBUG',
      LOG_DIR: '/tmp/portsweep-logs',
    })
    assert.deepStrictEqual(config, {
      timeoutMs: 250,
      concurrency: 32,
      logLevel: 'debug',
      logDir: '/tmp/portsweep-logs',
    })
  })

  it('rejects non-numeric values and unknown log levels', () => {
    assert.throws(() => loadConfig({ PORTSWEEP_TIMEOUT_MS: 'soon' }), { name: 'ScanError', code: 'InvalidConfig' })
    assert.throws(() => loadConfig({ PORTSWEEP_CONCURRENCY: '-4' }), { code: 'InvalidConfig' })
    assert.throws(() => loadConfig({ LOG_LEVEL: 'chatty' }), { code: 'InvalidConfig' })
  })
})

describe('createScanConfig', () => {
  it('returns a frozen config', () => {
    const config = createScanConfig({ timeoutMs: 200, verbose: true, concurrency: 8 })
    assert.deepStrictEqual(config, { timeoutMs: 200, verbose: true, concurrency: 8 })
    assert.ok(Object.isFrozen(config))
  })

  it('defaults verbose and concurrency', () => {
    assert.deepStrictEqual(createScanConfig({ timeoutMs: 1000 }), {
      timeoutMs: 1000,
      verbose: false,
      concurrency: DEFAULT_CONCURRENCY,
    })
  })

  it('rejects invalid timeouts and concurrency limits', () => {
    for (const input of [
      { timeoutMs: 0 },
      { timeoutMs: -5 },
      { timeoutMs: Number.NaN },
      { timeoutMs: 1.5 },
      { timeoutMs: 100, concurrency: 0 },
      { timeoutMs: 100, concurrency: 70000 },
    ]) {
      assert.throws(() => createScanConfig(input), { name: 'ScanError', code: 'InvalidConfig' })
    }
  })

  it('rejects timeouts longer than a timer can wait', () => {
    assert.equal(createScanConfig({ timeoutMs: MAX_TIMEOUT_MS }).timeoutMs, 2147483647)
    assert.throws(() => createScanConfig({ timeoutMs: 3_000_000_000 }), {
      name: 'ScanError',
      code: 'InvalidConfig',
      message: 'Timeout must be at most 2147483647ms, got 3000000000',
    })
  })
})

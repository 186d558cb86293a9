import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { countTargets, expandTargets, formatTarget } from '../src/scanner/targets.js'

describe('expandTargets', () => {
  it('yields addresses in input order and ports ascending within each', () => {
    const targets = [...expandTargets(['10.0.0.2', '10.0.0.1'], [22, 80])]
    assert.deepStrictEqual(targets, [
      { address: '10.0.0.2', port: 22 },
      { address: '10.0.0.2', port: 80 },
      { address: '10.0.0.1', port: 22 },
      { address: '10.0.0.1', port: 80 },
    ])
  })

  it('produces |addresses| x |ports| distinct targets', () => {
    const addresses = ['127.0.0.1', '::1', '192.168.1.1']
    const ports = Array.from({ length: 100 }, (_, i) => i + 1)
    const targets = [...expandTargets(addresses, ports)]

    assert.equal(targets.length, countTargets(addresses, ports))
    assert.equal(targets.length, 300)
    assert.equal(new Set(targets.map(formatTarget)).size, 300)
  })

  it('is lazy', () => {
    const iterator = expandTargets(['127.0.0.1'], [1, 2, 3])
    assert.deepStrictEqual(iterator.next().value, { address: '127.0.0.1', port: 1 })
  })

  it('fails with NoTargets when there are no addresses', () => {
    assert.throws(() => expandTargets([], [80]), { name: 'ScanError', code: 'NoTargets' })
  })

  it('fails with NoTargets when there are no ports', () => {
    assert.throws(() => expandTargets(['127.0.0.1'], []), { name: 'ScanError', code: 'NoTargets' })
  })
})

describe('formatTarget', () => {
  it('brackets IPv6 addresses', () => {
    assert.equal(formatTarget({ address: '::1', port: 443 }), '[::1]:443')
    assert.equal(formatTarget({ address: '127.0.0.1', port: 443 }), '127.0.0.1:443')
  })
})

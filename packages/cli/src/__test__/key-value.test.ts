import { describe, test, expect } from 'vitest'
import { coerceConfigValue, configPair, splitKeyValue, tagPair, toRecord } from '../parsers/key-value.js'
import { ErrInvalidParam } from '../errors.js'

describe('splitKeyValue', () => {
  test('splits on the first =', () => {
    expect(splitKeyValue('query=a=b', '--config')).toEqual({ key: 'query', value: 'a=b' })
    expect(splitKeyValue('empty=', '--tag')).toEqual({ key: 'empty', value: '' })
  })

  test('rejects input without =', () => {
    let thrown: unknown
    try {
      splitKeyValue('workers', '--config')
    } catch (e) {
      thrown = e
    }
    expect(ErrInvalidParam.is(thrown)).toBe(true)
    expect(ErrInvalidParam.is(thrown) && thrown.message).toBe(
      'Invalid value for --config: "workers" (expected KEY=VALUE)',
    )
  })
})

describe('coerceConfigValue', () => {
  test('integers', () => {
    expect(coerceConfigValue('42')).toBe(42)
    expect(coerceConfigValue('-7')).toBe(-7)
    expect(coerceConfigValue('+3')).toBe(3)
  })

  test('integers past the safe range stay strings', () => {
    expect(coerceConfigValue('12345678901234567890')).toBe('12345678901234567890')
  })

  test('floats', () => {
    expect(coerceConfigValue('0.5')).toBe(0.5)
    expect(coerceConfigValue('.25')).toBe(0.25)
    expect(coerceConfigValue('1e3')).toBe(1000)
  })

  test('booleans in any case', () => {
    expect(coerceConfigValue('true')).toBe(true)
    expect(coerceConfigValue('FALSE')).toBe(false)
    expect(coerceConfigValue('True')).toBe(true)
  })

  test('everything else is the string as typed', () => {
    expect(coerceConfigValue('eu-west-1')).toBe('eu-west-1')
    expect(coerceConfigValue('')).toBe('')
    expect(coerceConfigValue('yes')).toBe('yes')
    expect(coerceConfigValue('1.2.3')).toBe('1.2.3')
  })
})

describe('value parsers', () => {
  test('--tag keeps values as strings', () => {
    expect(tagPair().parse('port=8080')).toEqual({ success: true, value: { key: 'port', value: '8080' } })
  })

  test('--config coerces values', () => {
    expect(configPair().parse('port=8080')).toEqual({ success: true, value: { key: 'port', value: 8080 } })
    expect(configPair().format({ key: 'debug', value: true })).toBe('debug=true')
  })

  test('a pair without = fails to parse', () => {
    expect(configPair().parse('port').success).toBe(false)
  })

  test('toRecord lets later pairs win', () => {
    expect(toRecord([
      { key: 'a', value: 1 },
      { key: 'b', value: 2 },
      { key: 'a', value: 3 },
    ])).toEqual({ a: 3, b: 2 })
  })
})

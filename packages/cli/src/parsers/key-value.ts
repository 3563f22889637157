/**
 * `key=value` arguments for --tag and --config.
 *
 * Values given to --config are coerced: integer, then float, then boolean
 * (true/false, any case), else the string as typed.
 */

import type { ConfigValue } from '@drover/workload'
import type { ValueParser, ValueParserResult } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import { ErrInvalidParam } from '../errors.js'

export interface KeyValue<V> {
  key: string
  value: V
}

const INTEGER = /^[+-]?\d+$/
const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/** Split on the first `=`. The value may be empty or contain further `=` */
export function splitKeyValue(input: string, param: string): KeyValue<string> {
  const eq = input.indexOf('=')
  if (eq === -1) {
    throw ErrInvalidParam.create({ param, value: input, reason: 'expected KEY=VALUE' })
  }
  return { key: input.slice(0, eq), value: input.slice(eq + 1) }
}

export function coerceConfigValue(raw: string): ConfigValue {
  if (INTEGER.test(raw)) {
    const n = Number(raw)
    // Past 2^53 a number would silently change the value
    return Number.isSafeInteger(n) ? n : raw
  }
  if (FLOAT.test(raw)) return Number(raw)
  const lower = raw.toLowerCase()
  if (lower === 'true') return true
  if (lower === 'false') return false
  return raw
}

function keyValueParser<V>(param: string, convert: (raw: string) => V): ValueParser<'sync', KeyValue<V>> {
  return {
    $mode: 'sync',
    metavar: 'KEY=VALUE',

    parse(input: string): ValueParserResult<KeyValue<V>> {
      try {
        const { key, value } = splitKeyValue(input, param)
        return { success: true, value: { key, value: convert(value) } }
      } catch (e: unknown) {
        const msg = ErrInvalidParam.is(e) ? e.message : String(e)
        return { success: false, error: message`${msg}` }
      }
    },

    format(pair: KeyValue<V>): string {
      return `${pair.key}=${String(pair.value)}`
    },
  }
}

/** --tag: values stay strings */
export const tagPair = (): ValueParser<'sync', KeyValue<string>> => keyValueParser('--tag', (raw) => raw)

/** --config: values are coerced */
export const configPair = (): ValueParser<'sync', KeyValue<ConfigValue>> => keyValueParser('--config', coerceConfigValue)

/** Later pairs win over earlier ones with the same key */
export function toRecord<V>(pairs: readonly KeyValue<V>[]): Record<string, V> {
  const out: Record<string, V> = {}
  for (const { key, value } of pairs) out[key] = value
  return out
}

import { withDefault } from '@optique/core/modifiers'
import { flag, option } from '@optique/core/primitives'
import { choice } from '@optique/core/valueparser'
import { message } from '@optique/core/message'

export type OutputFormat = 'text' | 'json'

export const outputFormat = choice(['text', 'json'] as const)

/** --format text|json, defaulting to text */
export const formatOption = withDefault(
  option('-f', '--format', outputFormat, { description: message`Output format (text, json)` }),
  'text' as const,
)

/** --yes: skip the confirmation prompt */
export const yesOption = withDefault(
  flag('-y', '--yes', { description: message`Skip confirmation` }),
  false,
)


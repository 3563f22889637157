/**
 * CLI error boundary - errors owned by argument handling and dispatch.
 */

import { BadInput, DroverError, ErrFacet, NotFound } from '@drover/core'

export const CliBoundary = DroverError.boundary('cli')

/** A value that does not have the shape its option needs. */
export const ErrInvalidParam = CliBoundary.define('invalid_param', {
  customProps: ErrFacet.props<{ param: string; value: string; reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid value for ${d.param}: "${d.value}" (${d.reason})`,
})

/** No command matched the parsed input. */
export const ErrUnknownCommand = CliBoundary.define('unknown_command', {
  customProps: ErrFacet.props<{ command: string }>(),
  facets: [NotFound],
  message: (d) => `Unknown command: ${d.command}`,
})

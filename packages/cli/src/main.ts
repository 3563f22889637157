/**
 * CLI harness - process-level entry point.
 *
 * All process-level concerns (global flags, SIGINT, stream flushing,
 * process.exit) live here. The CLI class in cli.ts is pure logic.
 */

import { GlobalConfig } from '@drover/platform-node'
import { parseSync, passThrough } from '@optique/core'
import { object } from '@optique/core/constructs'
import { formatMessage } from '@optique/core/message'
import { withDefault } from '@optique/core/modifiers'
import { flag } from '@optique/core/primitives'

import { CLI } from './cli.js'
import { Interrupt } from './interrupt.js'
import type { CliRequest } from './types.js'

/** Write data in 64 KB chunks, awaiting flush on each to avoid truncation when piped. */
async function flushWrite(stream: NodeJS.WritableStream, data: string): Promise<void> {
  const CHUNK = 65536
  let offset = 0
  while (offset < data.length) {
    const chunk = data.slice(offset, offset + CHUNK)
    offset += CHUNK
    await new Promise<void>((resolve, reject) => {
      stream.write(chunk, (err) => (err ? reject(err) : resolve()))
    })
  }
}

const globalParsers = object({
  color: withDefault(flag('--color'), false),
  noColor: withDefault(flag('--no-color'), false),
  command: passThrough({ format: 'greedy' }),
})

export async function main(): Promise<void> {
  const parsed = parseSync(globalParsers, process.argv.slice(2))
  if (!parsed.success) {
    console.error('Unexpected error')
    throw new Error(formatMessage(parsed.error))
  }

  const { color, noColor } = parsed.value
  const cfg = new GlobalConfig({
    useColor: noColor ? false : color ? true : undefined,
    cwd: process.cwd(),
  })
  const cli = new CLI(cfg)

  const interrupt = new Interrupt((code) => process.exit(code))
  process.on('SIGINT', interrupt.onSignal)

  const req: CliRequest = {
    argv: parsed.value.command,
    color: cfg.useColor,
  }

  const response = await cli.execute(req, { interrupt }).catch((err: unknown) => {
    console.error(err)
    process.exit(1)
  })

  const writes: Promise<void>[] = []
  if (response.stdout) writes.push(flushWrite(process.stdout, response.stdout))
  if (response.stderr) writes.push(flushWrite(process.stderr, response.stderr))
  await Promise.all(writes)

  process.exit(response.exitCode)
}

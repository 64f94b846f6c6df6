/**
 * Request Command - raw call through the client pipeline
 *
 * Usage:
 *   amee request /profiles
 *   amee request /profiles -X POST -d profile=true
 *   amee request /data/home/appliances/drill -q device=fridge --no-cache
 */

import { Command, Option } from 'commander'
import { ValidationError, type RequestDescriptor } from '@amee-client/core'
import { runWithSession } from '../session.js'
import { HTTP_METHODS, coerceValues, collectPair, isHttpMethod } from '../utils/options.js'

interface RequestOptions {
  method: string
  query: Record<string, string>
  data: Record<string, string>
  cache: boolean
}

/**
 * Build the descriptor a request invocation describes
 *
 * @throws ValidationError for a method the client does not issue
 */
export function toDescriptor(path: string, opts: RequestOptions): RequestDescriptor {
  const method = opts.method.toUpperCase()
  if (!isHttpMethod(method)) {
    throw new ValidationError(`Unsupported method '${opts.method}'`, { field: 'method' })
  }

  const descriptor: RequestDescriptor = { method, path, cache: opts.cache }
  if (Object.keys(opts.query).length > 0) {
    descriptor.query = opts.query
  }
  if (Object.keys(opts.data).length > 0) {
    descriptor.body = coerceValues(opts.data)
  }
  return descriptor
}

export function createRequestCommand(): Command {
  return new Command('request')
    .description('Send a request through the client and print the JSON answer')
    .argument('<path>', 'Path relative to the server, e.g. /profiles')
    .addOption(
      new Option('-X, --method <method>', 'HTTP method').choices(HTTP_METHODS).default('GET')
    )
    .option('-q, --query <key=value>', 'Query parameter (repeatable)', collectPair, {})
    .option('-d, --data <key=value>', 'Body parameter (repeatable)', collectPair, {})
    .option('--no-cache', 'Skip the response cache for this read')
    .action(async (path: string, opts: RequestOptions, command: Command) => {
      await runWithSession(command, async (client) => {
        const document = await client.request(toDescriptor(path, opts))
        console.log(JSON.stringify(document, null, 2))
      })
    })
}

import type { IncomingMessage } from 'node:http'
import { GraphQLError } from 'graphql'

import { getClientIp, type RateLimiter } from '@/lib/rate-limit'
import { DEFAULT_SCHEMA, buildFilterOptions, type Dataset, type FilterOptions, type Schema } from '@/lib/schema'
import { DEFAULT_INJURY_CATEGORIES, type InjuryCategories } from '@/lib/summary'

// Shared by every request. The dataset is a read-only snapshot, so requests
// never need to copy or lock it.
export type ExplorerContext = {
  dataset: Dataset
  schema: Schema
  options: FilterOptions
  injuryCategories: InjuryCategories
}

export function createExplorerContext(
  dataset: Dataset,
  settings: { schema?: Schema; injuryCategories?: InjuryCategories } = {}
): ExplorerContext {
  return Object.freeze({
    dataset,
    schema: settings.schema ?? DEFAULT_SCHEMA,
    // Option lists are computed once per snapshot, not per request.
    options: buildFilterOptions(dataset),
    injuryCategories: settings.injuryCategories ?? DEFAULT_INJURY_CATEGORIES,
  })
}

/**
 * Context function for the HTTP server: rejects clients over the rate limit
 * with a 429, otherwise hands out the shared context.
 */
export function createContextFunction(context: ExplorerContext, limiter: RateLimiter) {
  return async ({ req }: { req: IncomingMessage }): Promise<ExplorerContext> => {
    const result = limiter.check(getClientIp(req))
    if (!result.allowed) {
      throw new GraphQLError('Too many requests. Please slow down.', {
        extensions: {
          code: 'RATE_LIMITED',
          http: {
            status: 429,
            headers: new Map([['retry-after', String(result.retryAfter)]]),
          },
        },
      })
    }
    return context
  }
}

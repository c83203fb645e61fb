import * as Sentry from '@sentry/node'
import { startStandaloneServer } from '@apollo/server/standalone'

import { loadConfig } from '@/lib/config'
import { createContextFunction, createExplorerContext } from '@/lib/graphql/context'
import { createApolloServer } from '@/lib/graphql/server'
import { DataSourceUnavailableError, loadDataset } from '@/lib/load-data'
import { RateLimiter } from '@/lib/rate-limit'
import { DEFAULT_SCHEMA } from '@/lib/schema'

const config = loadConfig()

if (config.sentryDsn) {
  Sentry.init({ dsn: config.sentryDsn, environment: config.env })
}

function reportError(error: unknown) {
  console.error('[explorer] resolver error:', error)
  if (config.sentryDsn) Sentry.captureException(error)
}

async function main() {
  const dataset = await loadDataset(config.dataPath, DEFAULT_SCHEMA)
  console.info(`[explorer] loaded ${dataset.rows.length} rows from ${config.dataPath}`)

  const context = createExplorerContext(dataset, {
    schema: DEFAULT_SCHEMA,
    injuryCategories: config.injuryCategories,
  })
  const server = createApolloServer({ reportError })

  const { url } = await startStandaloneServer(server, {
    listen: { port: config.port },
    context: createContextFunction(context, new RateLimiter(config.rateLimitMax)),
  })
  console.info(`[explorer] GraphQL API ready at ${url}`)
}

main().catch(async (error: unknown) => {
  if (error instanceof DataSourceUnavailableError) {
    console.error(`[explorer] ${error.message}`)
  } else {
    console.error('[explorer] failed to start:', error)
    if (config.sentryDsn) {
      Sentry.captureException(error)
      await Sentry.flush(2000)
    }
  }
  process.exitCode = 1
})

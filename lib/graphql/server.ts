import { ApolloServer, type ApolloServerPlugin } from '@apollo/server'
import { GraphQLError, type ASTNode, type ValidationContext, type ValidationRule } from 'graphql'

import type { ExplorerContext } from './context'
import { resolvers } from './resolvers'
import { typeDefs } from './typeDefs'

// ── Query depth limiting ──────────────────────────────────────────────────────
// Rejects queries deeper than MAX_DEPTH before they reach any resolver.
// The schema is shallow (max legitimate depth ≈ 3), so 5 leaves ample headroom.

export const MAX_DEPTH = 5

function queryDepth(node: ASTNode, depth = 0): number {
  if ('selectionSet' in node && node.selectionSet) {
    const sels = node.selectionSet.selections
    if (sels.length === 0) return depth
    return Math.max(...sels.map((s) => queryDepth(s, depth + 1)))
  }
  return depth
}

export const depthLimitRule: ValidationRule = (context: ValidationContext) => ({
  Document(doc) {
    for (const def of doc.definitions) {
      const depth = queryDepth(def)
      if (depth > MAX_DEPTH) {
        context.reportError(new GraphQLError(`Query depth limit exceeded (max: ${MAX_DEPTH}).`))
      }
    }
  },
})

// ── Error reporting ───────────────────────────────────────────────────────────
// Only errors thrown from resolver code are reported; validation failures and
// GraphQLErrors raised on purpose (BAD_USER_INPUT, RATE_LIMITED) are not.

export function errorReportingPlugin(
  report: (error: unknown) => void
): ApolloServerPlugin<ExplorerContext> {
  return {
    async requestDidStart() {
      return {
        async didEncounterErrors({ errors }) {
          for (const error of errors) {
            const cause = error.originalError
            if (cause && !(cause instanceof GraphQLError)) report(cause)
          }
        },
      }
    },
  }
}

export function createApolloServer(
  options: { reportError?: (error: unknown) => void } = {}
): ApolloServer<ExplorerContext> {
  const plugins = options.reportError ? [errorReportingPlugin(options.reportError)] : []
  return new ApolloServer<ExplorerContext>({
    typeDefs,
    resolvers,
    validationRules: [depthLimitRule],
    plugins,
  })
}

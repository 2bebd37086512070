import { makeExecutableSchema, type IExecutableSchemaDefinition } from '@graphql-tools/schema';
import {
  NoSchemaIntrospectionCustomRule,
  Kind,
  type ValidationRule,
  type DocumentNode,
  type OperationDefinitionNode,
  type FieldNode,
} from 'graphql';
import depthLimit from 'graphql-depth-limit';
import mercuriusPlugin, { type IResolvers } from 'mercurius';

import type { FastifyPluginAsync } from 'fastify';

/**
 * Maximum allowed query depth.
 * The case-analytics schema is flat (query → object → scalar), so anything
 * deeper than this is not a legitimate dashboard query.
 */
const MAX_QUERY_DEPTH = 6;

/**
 * Extracts the first operation definition from a GraphQL document.
 */
function findOperation(document: DocumentNode): OperationDefinitionNode | undefined {
  return document.definitions.find(
    (def): def is OperationDefinitionNode => def.kind === Kind.OPERATION_DEFINITION
  );
}

/**
 * Extracts the top-level field names being queried.
 * E.g., for `query { periodCatalog { latestOrdinal } health }` returns ['periodCatalog', 'health']
 */
function extractFieldNames(operation: OperationDefinitionNode | undefined): string[] {
  if (operation === undefined) {
    return [];
  }

  return operation.selectionSet.selections
    .filter((sel): sel is FieldNode => sel.kind === Kind.FIELD)
    .map((field) => field.name.value);
}

export interface GraphQLOptions {
  schema: string[];
  resolvers: IResolvers[];
  /** Serve GraphiQL at /graphiql. Defaults to on outside production. */
  enableGraphiQL?: boolean;
  /** Disables introspection when true. Defaults to NODE_ENV === 'production'. */
  isProduction?: boolean;
}

/**
 * Creates the GraphQL plugin with the provided schema fragments and resolvers.
 *
 * - Query depth limited to MAX_QUERY_DEPTH
 * - Introspection disabled in production
 */
export const makeGraphQLPlugin = (options: GraphQLOptions): FastifyPluginAsync => {
  const isProduction = options.isProduction ?? process.env['NODE_ENV'] === 'production';
  const { schema: typeDefs, resolvers, enableGraphiQL = !isProduction } = options;

  const schema = makeExecutableSchema({
    typeDefs,
    resolvers,
  } as IExecutableSchemaDefinition);

  const validationRules: ValidationRule[] = [
    depthLimit(MAX_QUERY_DEPTH) as ValidationRule,
    ...(isProduction ? [NoSchemaIntrospectionCustomRule] : []),
  ];

  return async (fastify) => {
    await fastify.register(mercuriusPlugin, {
      schema,
      graphiql: enableGraphiQL,
      path: '/graphql',
      validationRules,
    });

    // Context extension for storing the document between hooks
    interface GraphQLLoggingContext {
      graphqlDocument?: DocumentNode;
    }

    fastify.graphql.addHook('preExecution', (_schema, document, context) => {
      (context as GraphQLLoggingContext).graphqlDocument = document;
    });

    fastify.graphql.addHook('onResolution', (execution, context) => {
      const document = (context as GraphQLLoggingContext).graphqlDocument;
      const operation = document !== undefined ? findOperation(document) : undefined;

      const operationName = operation?.name?.value ?? null;
      const operationType = operation?.operation ?? 'unknown';
      const fields = extractFieldNames(operation);
      const errorCount = execution.errors?.length ?? 0;

      const logEntry = {
        graphql: {
          operationType,
          operationName,
          fields,
          hasErrors: errorCount > 0,
          errorCount,
        },
      };

      if (errorCount > 0) {
        context.reply.log.warn(
          { ...logEntry, errors: execution.errors },
          `GraphQL ${operationType} "${operationName ?? 'anonymous'}" completed with ${String(errorCount)} error(s)`
        );
      } else {
        context.reply.log.info(
          logEntry,
          `GraphQL ${operationType} "${operationName ?? 'anonymous'}" [${fields.join(', ')}]`
        );
      }
    });
  };
};

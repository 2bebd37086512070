/**
 * Base GraphQL schema
 * Defines the root Query type that every module extends
 */
export const BaseSchema = /* GraphQL */ `
  type Query {
    _empty: String
  }
`;

/**
 * Health GraphQL Schema
 */
export const schema = /* GraphQL */ `
  extend type Query {
    """
    Returns 'ok' while the process is up
    """
    health: String!

    """
    Runs every health checker
    """
    ready: Readiness!

    """
    Counts from the startup load. Null when the server was built without a dataset.
    """
    datasetSummary: DatasetSummary
  }

  type Readiness {
    """
    ok, degraded or unhealthy
    """
    status: String!
    version: String
    uptime: Float!
    checks: [HealthCheck!]!
    timestamp: String!
  }

  type HealthCheck {
    name: String!
    status: String!
    message: String
    latencyMs: Float
    critical: Boolean
  }

  type DroppedRows {
    UNKNOWN_COUNTY: Int!
    UNRESOLVED_SPECIAL_CASE: Int!
    UNRESOLVABLE_LOCATION: Int!
    INVALID_DATE: Int!
  }

  type DatasetSummary {
    rawRows: Int!
    gazetteerRows: Int!
    observations: Int!
    locations: Int!
    periods: Int!
    latestDate: String
    latestPeriod: String
    dropped: DroppedRows!
    warnings: Int!
  }
`;

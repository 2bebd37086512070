/**
 * Case Analytics GraphQL Schema
 *
 * Period slider, city picker, county/state/national snapshots, chart series and
 * the county map layer.
 */

export const CaseAnalyticsSchema = /* GraphQL */ `
  # ---------------------------------------------------------------------------
  # Types
  # ---------------------------------------------------------------------------

  """
  CURRENT for the latest period (trailing 7-day comparison),
  HISTORICAL for earlier periods (period against eventual total)
  """
  enum SnapshotMode {
    CURRENT
    HISTORICAL
  }

  type PeriodEntry {
    """
    1-based slider position
    """
    ordinal: Int!

    """
    Month label, e.g. 'Mar, 2020'
    """
    label: String!
  }

  type PeriodCatalog {
    periods: [PeriodEntry!]!
    latestOrdinal: Int!
    latestLabel: String
  }

  type CityLocation {
    """
    Picker label, e.g. 'Kansas City, MO'
    """
    cityKey: String!
    city: String!
    stateAbbr: String!
    county: String!
    state: String!

    """
    Key of the county time series, e.g. 'Jackson, Missouri'
    """
    countyStateKey: String!
    fips: String
  }

  type CountySnapshot {
    countyStateKey: String!
    period: String!
    periodOrdinal: Int!
    mode: SnapshotMode!
    cumulativeCases: Int!
    cumulativeDeaths: Int!

    """
    Signed percentage with two decimals; 0 when the comparison base is not positive
    """
    pctChangeCases: Float!
    pctChangeDeaths: Float!
    asOfDate: String

    """
    False when the county has no reports at all
    """
    hasData: Boolean!
  }

  type StateSnapshot {
    state: String!
    period: String!
    periodOrdinal: Int!
    totalCases: Int!
    totalDeaths: Int!
    countyCount: Int!
  }

  type NationalSnapshot {
    period: String!
    periodOrdinal: Int!
    totalCases: Int!
    totalDeaths: Int!
    stateCount: Int!
    countyCount: Int!
  }

  type MonthlySeriesPoint {
    period: String!
    newCases: Int!
    newDeaths: Int!
  }

  type DailySeriesPoint {
    date: String!
    period: String!
    cases: Int!
    deaths: Int!
    newCases: Int!
    newDeaths: Int!
  }

  type CountyMapEntry {
    fips: String!
    countyStateKey: String!
    county: String!
    state: String!
    cases: Int!
    deaths: Int!

    """
    Cases per thousand, clipped to the colour scale range [0, 11]
    """
    casesPerThousand: Float!
    asOfDate: String!
  }

  # ---------------------------------------------------------------------------
  # Root Query Extension
  # ---------------------------------------------------------------------------

  extend type Query {
    """
    Month periods present in the data, in slider order
    """
    periodCatalog: PeriodCatalog!

    """
    City picker options, optionally filtered by a case-insensitive substring
    """
    cities(search: String, limit: Int = 20): [CityLocation!]!

    """
    Resolves a picker label to its county. Null when the city is unknown.
    """
    resolveCity(city: String!): CityLocation

    """
    Null when the period ordinal is out of range
    """
    countySnapshot(countyStateKey: String!, periodOrdinal: Int!): CountySnapshot

    """
    Null when the period ordinal is out of range
    """
    stateSnapshot(state: String!, periodOrdinal: Int!): StateSnapshot

    """
    Null when the period ordinal is out of range
    """
    nationalSnapshot(periodOrdinal: Int!): NationalSnapshot

    """
    New counts per month. An unknown county gets zeros for every period.
    """
    monthlySeries(countyStateKey: String!): [MonthlySeriesPoint!]!

    """
    Cumulative and new counts per report date. Empty for an unknown county.
    """
    dailySeries(countyStateKey: String!): [DailySeriesPoint!]!

    """
    Null when the period ordinal is out of range
    """
    countyMap(periodOrdinal: Int!): [CountyMapEntry!]
  }
`;

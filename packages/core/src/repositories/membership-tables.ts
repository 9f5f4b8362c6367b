export type MembershipKind = 'country' | 'language';

export interface MembershipTableDefinition {
  /** Published table read by the analytical queries. */
  table: string;
  /** Staging table filled before the published table is swapped. */
  stagingTable: string;
  valueColumn: string;
  /** Delimited column on `movie` the memberships are derived from. */
  sourceColumn: string;
}

export const MEMBERSHIP_TABLES: Readonly<Record<MembershipKind, MembershipTableDefinition>> = {
  country: {
    table: 'movie_country',
    stagingTable: 'stg_movie_country',
    valueColumn: 'country',
    sourceColumn: 'country',
  },
  language: {
    table: 'movie_language',
    stagingTable: 'stg_movie_language',
    valueColumn: 'language',
    sourceColumn: 'languages',
  },
};

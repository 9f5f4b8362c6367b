// Database
export {
  createDatabaseConnection,
  closeDatabaseConnection,
  runInTransaction,
  type CreateDatabaseInput,
  type DatabaseConnection,
} from './database.ts';

// Migrations
export {
  MIGRATIONS,
  runMigrations,
  type MigrationDefinition,
  type RunMigrationsOptions,
  type RunMigrationsResult,
} from './migrations/index.ts';

// Repositories
export {
  createDatasetRepository,
  type DatasetRepository,
} from './repositories/dataset-repository.ts';
export {
  MEMBERSHIP_TABLES,
  type MembershipKind,
  type MembershipTableDefinition,
} from './repositories/membership-tables.ts';
export {
  ROLE_CATEGORIES,
  type DirectorMappingInput,
  type GenreInput,
  type MembershipRecord,
  type MovieInput,
  type MovieRecord,
  type NameInput,
  type RatingInput,
  type RatingRecord,
  type RoleCategory,
  type RoleMappingInput,
} from './repositories/types.ts';

// Dataset fixtures
export {
  DatasetFixtureSchema,
  loadDatasetFixtureFromFile,
  parseDatasetFixture,
  seedDatabaseFromDataset,
  type DatasetFixture,
  type SeedDatasetResult,
} from './fixtures/index.ts';

// Analytical queries
export { ANALYTICAL_QUERIES } from './queries/catalog/index.ts';
export {
  createAnalyticsQueries,
  resolveQueryParams,
  type AnalyticsQueries,
  type CreateAnalyticsQueriesOptions,
  type QueryBatchOutcome,
} from './queries/analytics-queries.ts';
export {
  DEFAULT_QUERY_PARAMS,
  type AnalyticalQueryDefinition,
  type QueryCell,
  type QueryParameterName,
  type QueryParams,
  type QueryResult,
  type QueryRow,
} from './queries/types.ts';

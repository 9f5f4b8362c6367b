export {
  coerceGrossIncome,
  parseGrossIncome,
  type CoerceGrossIncomeOptions,
  type GrossIncomeCoercionSummary,
  type GrossIncomeInvalidReason,
  type GrossIncomeParseOutcome,
} from './gross-income.ts';

export {
  DEFAULT_MEMBERSHIP_SPLIT_OPTIONS,
  publishMembershipTable,
  rebuildMembershipTable,
  resolveMembershipSplitOptions,
  splitMembershipField,
  stageMembershipTable,
  type MembershipRebuildSummary,
  type MembershipSplitOptions,
  type RebuildMembershipOptions,
} from './membership-splitter.ts';

export {
  STANDARDIZATION_RULES,
  standardizeMissingValues,
  type StandardizationRule,
  type StandardizationSummary,
  type StandardizeMissingValuesOptions,
} from './standardizer.ts';

export {
  runNormalization,
  type NormalizationRunStatus,
  type NormalizationRunSummary,
  type RunNormalizationInput,
} from './normalization-runner.ts';

export { NUMERIC_SENTINEL, TEXT_SENTINEL, isMissingText, trimBlank } from './sentinels.ts';

// Types
export type {
  Severity,
  BuiltinRuleGroup,
  RuleId,
  Rule,
  ReportStatus,
  Report,
  SanityResult,
  Summary,
  DatasetStatus,
} from './types/sanity.js';
export { RULE_GROUPS, RULE_ID_PATTERN } from './types/sanity.js';

// Dataset snapshot provider
export {
  MANDATORY_TABLES,
  OPTIONAL_TABLES,
  ALL_TABLES,
  tableFile,
  isMandatoryTable,
} from './dataset/tables.js';
export type { TableName, TableRecord, MandatoryTable, OptionalTable } from './dataset/tables.js';
export { DatasetSnapshot, SnapshotWriter, recordToken } from './dataset/snapshot.js';
export { loadSnapshot } from './dataset/loader.js';
export type { SnapshotLoadResult } from './dataset/loader.js';
export { discoverTargets, resolveTarget, listVersions } from './dataset/discovery.js';
export type { DatasetTarget } from './dataset/discovery.js';
export { TABLE_SCHEMAS, validateTableRecords } from './dataset/table-schemas.js';

// Engine
export { defineChecker, ruleGroupOf, stringField, tokenLabel, toReasons } from './sanity/checker.js';
export type { Checker, CheckerDefinition } from './sanity/checker.js';
export { SanityContext } from './sanity/context.js';
export { RuleRegistry, activeCheckers, compareRuleIds } from './sanity/registry.js';
export type { RuleSelection } from './sanity/registry.js';
export { runCheckers } from './sanity/engine.js';
export type { RunOptions } from './sanity/engine.js';
export {
  EXCLUDED_REASON,
  NOT_LOADED_REASON,
  passedReport,
  failedReport,
  skippedReport,
  fixedReport,
  isUnresolvedFailure,
} from './sanity/report.js';
export { summarize, datasetStatus, sortResults } from './sanity/summary.js';
export { collectFailureFlags, exitCodeFor, resolveExitCode } from './sanity/exit-status.js';
export type { FailureFlags } from './sanity/exit-status.js';
export { checkTarget, scanDatasets } from './sanity/runner.js';
export type { SanityOptions, ScanOptions, ScanOutcome } from './sanity/runner.js';
export {
  SanityReporter,
  serializeResult,
  resultsToJson,
  writeResults,
  resultLabel,
} from './sanity/reporter.js';
export type { ReporterOptions, SerializedResult } from './sanity/reporter.js';

// Rule catalog
export { BUILTIN_RULES, RULE_ALIASES, createDefaultRegistry } from './sanity/rules/index.js';

// Errors
export {
  LoadError,
  RuleInternalError,
  DuplicateRuleError,
  InvalidRuleError,
  UnknownExcludeTargetError,
} from './sanity/errors.js';
export type { LoadErrorKind } from './sanity/errors.js';

// Config
export {
  DEFAULT_CONFIG_PATH,
  DEFAULT_SANITY_CONFIG,
  SanityConfigSchema,
  SanityConfigError,
  readSanityConfig,
  validateSanityConfig,
} from './config/sanity-config.js';
export type { SanityConfig } from './config/sanity-config.js';

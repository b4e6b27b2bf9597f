/**
 * depgate-core
 *
 * @license Apache-2.0
 *
 * Dependency policy audit gate: policy store, dependency tree parsing,
 * classification, transition validity, gate evaluation and reporting.
 */

// Types
export * from './types.js';

// Errors and logging
export {
  DepgateError,
  ConfigurationError,
  ParseError,
  ExternalToolError,
  isDepgateError,
} from './errors.js';
export type { DepgateErrorCode } from './errors.js';
export { silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// Policy
export { PolicyStore } from './policy/policy-store.js';
export { PolicyDocumentSchema } from './policy/policy-schema.js';
export type { PolicyDocument } from './policy/policy-schema.js';
export { parseTimestamp, formatUtc } from './policy/timestamps.js';
export { resolveProfiles } from './profiles/profile-resolver.js';

// Pipeline
export { parseTreeLine, parseDependencyTree, MAX_TREE_DEPTH } from './tree/tree-parser.js';
export type { TreeParseOptions, TreeParseResult } from './tree/tree-parser.js';
export { classifyDependency } from './classify/classifier.js';
export { evaluateTransition } from './classify/transition-validity.js';
export { evaluateGate, isBlocking } from './gate/gate-evaluator.js';
export { buildFindingList, compareFindings } from './report/report-builder.js';
export { buildAuditReport, buildFindingLogRows, toFindingRecord } from './report/audit-report.js';
export type {
  AuditReportDocument,
  FindingLogRow,
  FindingRecord,
} from './report/audit-report.js';

// Sources
export { CargoTreeSource, buildCargoTreeArgs } from './source/cargo-tree-source.js';
export type { DependencyTreeSource, CargoTreeSourceOptions } from './source/cargo-tree-source.js';

// Orchestrator
export { AuditOrchestrator, ProfileExecutor } from './orchestrator/index.js';
export type { AuditOrchestratorOptions, AuditRunOptions, ProfileScan } from './orchestrator/index.js';

// Reporters
export {
  BaseReporter,
  TextReporter,
  JsonReporter,
  NdjsonReporter,
  GitHubReporter,
  escapeCommandData,
} from './reporters/index.js';
export type { Reporter } from './reporters/index.js';

/**
 * Orchestrator Module - Exports
 *
 * @license Apache-2.0
 */

export { AuditOrchestrator } from './audit-orchestrator.js';
export type { AuditOrchestratorOptions, AuditRunOptions, ProfileScan } from './audit-orchestrator.js';
export { ProfileExecutor } from './profile-executor.js';

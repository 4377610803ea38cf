/**
 * Orchestrator Module
 */

export { ExecutionOrchestrator, createOrchestrator } from './orchestrator';
export type {
  RunOutcome,
  RunOptions,
  DryRunPreview,
  OrchestratorState,
  OrchestratorOptions,
  CreateOrchestratorOptions,
} from './orchestrator';
export { requiredStrength, isConfirmed, buildPrompt } from './confirmation';

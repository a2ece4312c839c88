/**
 * @chaosline/chaos
 *
 * Scoped, reversible fault injection against a remote chaos control plane.
 *
 * SAFETY: Experiments are BLOCKED in production unless explicitly overridden,
 * and every started experiment is rolled back when its handle is closed.
 */

// Types
export * from './types';

// Errors
export {
  ValidationError,
  ConfigError,
  SafetyViolationError,
  TransportError,
  RollbackFailedError,
  type TransportOperation,
} from './errors';

// Scenarios
export { ChaosScenario } from './scenario';
export {
  scenarioFromDefinition,
  ScenarioDefinitionSchema,
  type ScenarioDefinition,
} from './definitions';

// Transport
export type { ChaosTransport } from './transport/transport-interface';
export {
  HttpChaosClient,
  createHttpChaosClient,
  type HttpChaosClientOptions,
} from './transport/http-client';

// Safety
export { SafetyGate, type SafetyGateOptions } from './safety/safety-gate';

// Orchestration
export {
  ChaosOrchestrator,
  createChaosOrchestrator,
  type ChaosOrchestratorOptions,
} from './orchestrator/chaos-orchestrator';
export {
  ExperimentHandle,
  withExperiment,
  type Experiment,
  type ExperimentState,
  type ExperimentHandleDeps,
  type AuditSink,
} from './orchestrator/experiment-handle';
export { CleanupHealth, type RollbackFailure } from './orchestrator/cleanup-health';

// Config
export {
  ENV_KEYS,
  resolveEnvironmentName,
  loadChaosConfigFromEnv,
  loadChaosEnvFile,
  EnvChaosEnvironment,
  FileChaosEnvironment,
  createChaosOrchestratorFromEnv,
  getChaosOrchestrator,
  setChaosOrchestrator,
  resetChaosOrchestrator,
  type ChaosConfig,
  type ChaosFromEnvOptions,
} from './config/env-config';

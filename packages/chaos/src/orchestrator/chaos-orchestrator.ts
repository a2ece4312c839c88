/**
 * Chaos Orchestrator
 *
 * Entry point for tests. Validates the scenario, runs the safety gate
 * against the live environment name, starts the experiment remotely and
 * hands back an ExperimentHandle that rolls it back on close.
 *
 * @example
 * ```typescript
 * await orchestrator.withChaos(ChaosScenario.kill('auth-service', 5_000), async () => {
 *   await expectLoginFallback();
 * });
 * ```
 */

import {
  createChildLogger,
  generateId,
  logAuditEvent,
  logger as rootLogger,
  tryCatch,
} from '@chaosline/utils';

import { SafetyGate } from '../safety/safety-gate';
import { ChaosScenario } from '../scenario';
import type { ChaosTransport } from '../transport/transport-interface';
import type { ChaosEnvironment, ChaosLogger } from '../types';
import { CleanupHealth } from './cleanup-health';
import { ExperimentHandle, withExperiment, type AuditSink } from './experiment-handle';

// =============================================================================
// Orchestrator Options
// =============================================================================

export interface ChaosOrchestratorOptions {
  transport: ChaosTransport;
  /** Read on every startChaos call, never cached */
  environment: Pick<ChaosEnvironment, 'currentEnvironmentName'>;
  /** Allow experiments in production (default: false) */
  allowProductionOverride?: boolean;
  safetyGate?: SafetyGate;
  logger?: ChaosLogger;
  cleanupHealth?: CleanupHealth;
  audit?: AuditSink;
}

// =============================================================================
// Chaos Orchestrator
// =============================================================================

export class ChaosOrchestrator {
  readonly cleanupHealth: CleanupHealth;

  private readonly transport: ChaosTransport;
  private readonly environment: Pick<ChaosEnvironment, 'currentEnvironmentName'>;
  private readonly allowProductionOverride: boolean;
  private readonly safetyGate: SafetyGate;
  private readonly logger: ChaosLogger;
  private readonly audit: AuditSink;

  constructor(options: ChaosOrchestratorOptions) {
    this.transport = options.transport;
    this.environment = options.environment;
    this.allowProductionOverride = options.allowProductionOverride ?? false;
    this.logger =
      options.logger ?? createChildLogger(rootLogger, { component: 'chaos-orchestrator' });
    this.safetyGate = options.safetyGate ?? new SafetyGate({ logger: this.logger });
    this.cleanupHealth = options.cleanupHealth ?? new CleanupHealth();
    this.audit = options.audit ?? logAuditEvent;
  }

  async injectLatency(
    service: string,
    latencyMs: number,
    durationMs: number
  ): Promise<ExperimentHandle> {
    return this.startChaos(ChaosScenario.latency(service, latencyMs, durationMs));
  }

  async injectErrorRate(
    service: string,
    statusCode: number,
    percentage: number,
    durationMs: number
  ): Promise<ExperimentHandle> {
    return this.startChaos(ChaosScenario.httpError(service, statusCode, percentage, durationMs));
  }

  async killService(service: string, durationMs: number): Promise<ExperimentHandle> {
    return this.startChaos(ChaosScenario.kill(service, durationMs));
  }

  async isolateNetwork(service: string, durationMs: number): Promise<ExperimentHandle> {
    return this.startChaos(ChaosScenario.networkIsolation(service, durationMs));
  }

  /**
   * Start an experiment. No handle exists unless the remote start succeeded.
   *
   * @throws {SafetyViolationError} In production without override, before any request
   * @throws {TransportError} If the control plane rejects or cannot be reached
   */
  async startChaos(scenario: ChaosScenario): Promise<ExperimentHandle> {
    const environmentName = this.environment.currentEnvironmentName();
    this.safetyGate.check(environmentName, this.allowProductionOverride);

    const experimentId = generateId();
    const startedAt = new Date();

    this.logger.info(
      { experimentId, environment: environmentName, scenario: scenario.toWireMap() },
      'Starting chaos experiment'
    );

    await this.transport.start(experimentId, scenario);

    const handle = new ExperimentHandle(
      { id: experimentId, scenario, startedAt },
      {
        transport: this.transport,
        logger: this.logger,
        cleanupHealth: this.cleanupHealth,
        audit: this.audit,
      }
    );

    // The experiment is live remotely; the caller must get its handle back
    const audited = tryCatch(() =>
      this.audit(
        'chaos.experiment.started',
        { type: 'chaos_experiment', id: experimentId },
        { environment: environmentName, scenario: scenario.toWireMap() }
      )
    );
    if (!audited.ok) {
      this.logger.warn({ experimentId, err: audited.error }, 'Failed to audit chaos experiment start');
    }

    return handle;
  }

  /**
   * Run body while the scenario is injected; the experiment is rolled back
   * when body returns or throws.
   */
  withChaos<T>(
    scenario: ChaosScenario,
    body: (handle: ExperimentHandle) => T | Promise<T>
  ): Promise<T> {
    return withExperiment(this.startChaos(scenario), body);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createChaosOrchestrator(options: ChaosOrchestratorOptions): ChaosOrchestrator {
  return new ChaosOrchestrator(options);
}

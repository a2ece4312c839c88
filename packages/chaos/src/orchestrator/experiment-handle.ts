/**
 * ExperimentHandle - Caller-held token for one running experiment
 *
 * State machine: open -> closed (terminal). close() attempts the remote
 * stop exactly once; concurrent and repeated calls share that attempt. A
 * failed stop is logged at error level and recorded, never thrown, and the
 * handle ends closed even when a logger or audit sink throws.
 */

import { errorMessage, tryCatch, tryCatchAsync } from '@chaosline/utils';

import type { ChaosScenario } from '../scenario';
import type { ChaosTransport } from '../transport/transport-interface';
import type { ChaosLogger } from '../types';
import type { CleanupHealth } from './cleanup-health';

export interface Experiment {
  readonly id: string;
  readonly scenario: ChaosScenario;
  readonly startedAt: Date;
}

export type ExperimentState = 'open' | 'closed';

export type AuditSink = (
  action: string,
  target: { type: string; id: string },
  details?: Record<string, unknown>,
  status?: 'success' | 'failure'
) => void;

export interface ExperimentHandleDeps {
  transport: ChaosTransport;
  logger: ChaosLogger;
  cleanupHealth: CleanupHealth;
  audit: AuditSink;
}

export class ExperimentHandle implements Experiment {
  readonly id: string;
  readonly scenario: ChaosScenario;
  readonly startedAt: Date;

  private state: ExperimentState = 'open';
  private closing: Promise<void> | null = null;
  private readonly deps: ExperimentHandleDeps;

  constructor(experiment: Experiment, deps: ExperimentHandleDeps) {
    this.id = experiment.id;
    this.scenario = experiment.scenario;
    this.startedAt = experiment.startedAt;
    this.deps = deps;
  }

  get closed(): boolean {
    return this.state === 'closed';
  }

  getState(): ExperimentState {
    return this.state;
  }

  /**
   * Wall-clock time since the remote start call completed
   */
  elapsedMs(): number {
    return Date.now() - this.startedAt.getTime();
  }

  /**
   * Roll back the experiment. Resolves once the single stop attempt has
   * finished, whatever its outcome.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.rollback();
    }
    return this.closing;
  }

  private async rollback(): Promise<void> {
    try {
      const result = await tryCatchAsync(() => this.deps.transport.stop(this.id));
      const elapsedMs = this.elapsedMs();

      if (result.ok) {
        this.reportRolledBack(elapsedMs);
      } else {
        this.reportRollbackFailure(elapsedMs, result.error);
      }
    } finally {
      this.state = 'closed';
    }
  }

  private reportRolledBack(elapsedMs: number): void {
    const { logger, audit } = this.deps;

    this.guard('logger', () =>
      logger.info(
        { experimentId: this.id, targetService: this.scenario.targetService, elapsedMs },
        'Chaos experiment rolled back'
      )
    );
    this.guard('audit', () =>
      audit('chaos.experiment.rolled_back', this.auditTarget(), { elapsedMs })
    );
  }

  private reportRollbackFailure(elapsedMs: number, error: Error): void {
    const { logger, cleanupHealth, audit } = this.deps;
    const scenario = this.scenario.toWireMap();

    this.guard('logger', () =>
      logger.error(
        { experimentId: this.id, scenario, elapsedMs, err: error },
        'Failed to roll back chaos experiment; manual remediation may be required'
      )
    );
    this.guard('cleanupHealth', () =>
      cleanupHealth.record({
        experimentId: this.id,
        scenario,
        elapsedMs,
        error: errorMessage(error),
        failedAt: new Date(),
      })
    );
    this.guard('audit', () =>
      audit(
        'chaos.experiment.rollback_failed',
        this.auditTarget(),
        { elapsedMs, error: errorMessage(error) },
        'failure'
      )
    );
  }

  private auditTarget(): { type: string; id: string } {
    return { type: 'chaos_experiment', id: this.id };
  }

  /**
   * Reporting must not escape close(). A failing sink is logged as a
   * warning; if the logger itself fails, the failure goes to the process
   * warning channel.
   */
  private guard(sink: string, report: () => void): void {
    const outcome = tryCatch(report);
    if (outcome.ok) return;

    const warned = tryCatch(() =>
      this.deps.logger.warn(
        { experimentId: this.id, sink, err: outcome.error },
        'Chaos rollback reporting failed'
      )
    );
    if (!warned.ok) {
      process.emitWarning(
        `Chaos rollback reporting failed for ${this.id} (${sink}): ${outcome.error.message}`
      );
    }
  }
}

/**
 * Run body with an open handle and close it on every exit path
 */
export async function withExperiment<T>(
  acquire: ExperimentHandle | Promise<ExperimentHandle>,
  body: (handle: ExperimentHandle) => T | Promise<T>
): Promise<T> {
  const handle = await acquire;
  try {
    return await body(handle);
  } finally {
    await handle.close();
  }
}

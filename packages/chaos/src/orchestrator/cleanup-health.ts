/**
 * CleanupHealth
 *
 * Collects rollbacks that failed. ExperimentHandle.close() never throws, so
 * a suite that wants failed rollbacks to fail the run calls
 * assertHealthy() from its teardown.
 */

import { RollbackFailedError } from '../errors';
import type { ScenarioWireMap } from '../types';

export interface RollbackFailure {
  experimentId: string;
  scenario: ScenarioWireMap;
  elapsedMs: number;
  error: string;
  failedAt: Date;
}

export class CleanupHealth {
  private readonly entries: RollbackFailure[] = [];

  record(failure: RollbackFailure): void {
    this.entries.push(failure);
  }

  failures(): readonly RollbackFailure[] {
    return [...this.entries];
  }

  isHealthy(): boolean {
    return this.entries.length === 0;
  }

  /**
   * @throws {RollbackFailedError} Listing every experiment whose rollback failed
   */
  assertHealthy(): void {
    if (this.entries.length > 0) {
      throw new RollbackFailedError(this.entries.map((entry) => entry.experimentId));
    }
  }

  reset(): void {
    this.entries.length = 0;
  }
}

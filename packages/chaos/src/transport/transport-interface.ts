/**
 * Chaos Transport Interface
 *
 * Contract between the orchestrator and whatever talks to the chaos
 * control plane. One attempt per call; no retries at this layer.
 */

import type { ChaosScenario } from '../scenario';

export interface ChaosTransport {
  /**
   * Ask the control plane to begin injecting the scenario
   *
   * @throws {TransportError} On a non-2xx response, timeout or I/O failure
   */
  start(experimentId: string, scenario: ChaosScenario): Promise<void>;

  /**
   * Ask the control plane to revert the experiment. Stopping an experiment
   * that already expired remotely is expected to succeed.
   *
   * @throws {TransportError} On a non-2xx response, timeout or I/O failure
   */
  stop(experimentId: string): Promise<void>;
}

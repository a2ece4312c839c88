/**
 * SafetyGate - Refuses chaos in production
 *
 * Must run before an experiment ID is generated or any request is made.
 */

import { createChildLogger, logger as rootLogger } from '@chaosline/utils';

import { SafetyViolationError } from '../errors';
import { DEFAULT_PRODUCTION_MARKERS, type ChaosLogger } from '../types';

export interface SafetyGateOptions {
  /** Environment names treated as production (case-insensitive, default: PROD) */
  productionMarkers?: readonly string[];
  logger?: ChaosLogger;
}

export class SafetyGate {
  private readonly markers: ReadonlySet<string>;
  private readonly logger: ChaosLogger;

  constructor(options: SafetyGateOptions = {}) {
    const markers = options.productionMarkers ?? DEFAULT_PRODUCTION_MARKERS;
    this.markers = new Set(
      markers.map((marker) => marker.trim().toUpperCase()).filter((marker) => marker.length > 0)
    );
    this.logger = options.logger ?? createChildLogger(rootLogger, { component: 'chaos-safety' });
  }

  isProduction(environmentName: string): boolean {
    return this.markers.has(environmentName.trim().toUpperCase());
  }

  /**
   * @throws {SafetyViolationError} If the environment is production and no override is given
   */
  check(environmentName: string, overrideAllowed: boolean): void {
    if (!this.isProduction(environmentName)) {
      return;
    }

    if (!overrideAllowed) {
      throw new SafetyViolationError(environmentName);
    }

    this.logger.warn(
      { environment: environmentName },
      'Production override active: chaos experiment allowed in production'
    );
  }
}

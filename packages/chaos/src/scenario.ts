/**
 * ChaosScenario - Immutable description of a single fault
 *
 * Models only what to inject, where, and for how long. It never talks to
 * the control plane and knows nothing about environments. The static
 * factories are the only way to build one, so every instance is valid.
 */

import { z } from 'zod';

import { ValidationError } from './errors';
import type { ChaosType, ScenarioParameters, ScenarioWireMap } from './types';

// =============================================================================
// Field Schemas
// =============================================================================

const TargetServiceSchema = z
  .string({
    required_error: 'Target service cannot be null',
    invalid_type_error: 'Target service must be a string',
  })
  .refine((value) => value.trim().length > 0, 'Target service cannot be blank');

const positiveMs = (label: string) => {
  const message = `${label} must be a positive integer number of milliseconds`;
  return z
    .number({ required_error: `${label} cannot be null`, invalid_type_error: message })
    .int(message)
    .positive(message);
};

const DurationMsSchema = positiveMs('Duration');
const LatencyMsSchema = positiveMs('Latency');

const StatusCodeSchema = z
  .number({ invalid_type_error: 'HTTP status must be an integer' })
  .int('HTTP status must be an integer')
  .min(400, 'HTTP status must be between 400 and 599')
  .max(599, 'HTTP status must be between 400 and 599');

const PercentageSchema = z
  .number({ invalid_type_error: 'Error percentage must be an integer' })
  .int('Error percentage must be an integer')
  .min(1, 'Error percentage must be between 1 and 100')
  .max(100, 'Error percentage must be between 1 and 100');

function parseField<T>(schema: z.ZodType<T>, value: unknown, field: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues[0]?.message ?? `Invalid ${field}`;
    throw new ValidationError(message, field, { value });
  }
  return result.data;
}

// =============================================================================
// Chaos Scenario
// =============================================================================

export class ChaosScenario {
  readonly type: ChaosType;
  readonly targetService: string;
  readonly durationMs: number;
  readonly parameters: ScenarioParameters;

  private constructor(
    type: ChaosType,
    targetService: string,
    durationMs: number,
    parameters: Record<string, number>
  ) {
    this.type = type;
    this.targetService = targetService;
    this.durationMs = durationMs;
    this.parameters = Object.freeze(parameters);
    Object.freeze(this);
  }

  /**
   * Add a fixed delay to every response of the target service
   *
   * @throws {ValidationError} On a blank service or non-positive latency or duration
   */
  static latency(service: string, latencyMs: number, durationMs: number): ChaosScenario {
    const target = parseField(TargetServiceSchema, service, 'targetService');
    const duration = parseField(DurationMsSchema, durationMs, 'durationMs');
    const latency = parseField(LatencyMsSchema, latencyMs, 'latencyMs');

    return new ChaosScenario('LATENCY', target, duration, { latencyMs: latency });
  }

  /**
   * Fail a percentage of the target service's requests with the given status
   *
   * @throws {ValidationError} On a blank service, non-positive duration,
   * status outside 400-599 or percentage outside 1-100
   */
  static httpError(
    service: string,
    statusCode: number,
    percentage: number,
    durationMs: number
  ): ChaosScenario {
    const target = parseField(TargetServiceSchema, service, 'targetService');
    const duration = parseField(DurationMsSchema, durationMs, 'durationMs');
    const status = parseField(StatusCodeSchema, statusCode, 'statusCode');
    const pct = parseField(PercentageSchema, percentage, 'percentage');

    return new ChaosScenario('HTTP_ERROR', target, duration, {
      statusCode: status,
      percentage: pct,
    });
  }

  static kill(service: string, durationMs: number): ChaosScenario {
    return ChaosScenario.withoutParameters('KILL', service, durationMs);
  }

  static networkIsolation(service: string, durationMs: number): ChaosScenario {
    return ChaosScenario.withoutParameters('NETWORK_ISOLATION', service, durationMs);
  }

  private static withoutParameters(
    type: ChaosType,
    service: string,
    durationMs: number
  ): ChaosScenario {
    const target = parseField(TargetServiceSchema, service, 'targetService');
    const duration = parseField(DurationMsSchema, durationMs, 'durationMs');

    return new ChaosScenario(type, target, duration, {});
  }

  /**
   * Serialize to the control plane's scenario shape
   */
  toWireMap(): ScenarioWireMap {
    return {
      type: this.type,
      targetService: this.targetService,
      durationMs: this.durationMs,
      parameters: { ...this.parameters },
    };
  }

  toString(): string {
    return (
      `ChaosScenario{type=${this.type}, targetService=${this.targetService}, ` +
      `durationMs=${this.durationMs}, parameters=${JSON.stringify(this.parameters)}}`
    );
  }
}

/**
 * Declarative scenario definitions
 *
 * Turns plain objects (e.g. loaded from JSON) into ChaosScenario instances.
 * Only the shape is checked here; value rules stay in the ChaosScenario
 * factories so a definition cannot bypass them.
 */

import { z } from 'zod';

import { ValidationError } from './errors';
import { ChaosScenario } from './scenario';

const BaseDefinitionSchema = z.object({
  targetService: z.string(),
  durationMs: z.number(),
});

export const ScenarioDefinitionSchema = z.discriminatedUnion('type', [
  BaseDefinitionSchema.extend({
    type: z.literal('LATENCY'),
    parameters: z.object({ latencyMs: z.number() }),
  }),
  BaseDefinitionSchema.extend({
    type: z.literal('HTTP_ERROR'),
    parameters: z.object({ statusCode: z.number(), percentage: z.number() }),
  }),
  BaseDefinitionSchema.extend({
    type: z.literal('KILL'),
    parameters: z.object({}).optional(),
  }),
  BaseDefinitionSchema.extend({
    type: z.literal('NETWORK_ISOLATION'),
    parameters: z.object({}).optional(),
  }),
]);

export type ScenarioDefinition = z.infer<typeof ScenarioDefinitionSchema>;

/**
 * Build a scenario from an untyped definition
 *
 * @throws {ValidationError} If the shape is wrong or a value breaks a scenario rule
 */
export function scenarioFromDefinition(input: unknown): ChaosScenario {
  const parsed = ScenarioDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
    throw new ValidationError(
      `Invalid scenario definition: ${issue?.message ?? 'unknown error'}`,
      field
    );
  }

  const definition = parsed.data;
  switch (definition.type) {
    case 'LATENCY':
      return ChaosScenario.latency(
        definition.targetService,
        definition.parameters.latencyMs,
        definition.durationMs
      );
    case 'HTTP_ERROR':
      return ChaosScenario.httpError(
        definition.targetService,
        definition.parameters.statusCode,
        definition.parameters.percentage,
        definition.durationMs
      );
    case 'KILL':
      return ChaosScenario.kill(definition.targetService, definition.durationMs);
    case 'NETWORK_ISOLATION':
      return ChaosScenario.networkIsolation(definition.targetService, definition.durationMs);
  }
}

/**
 * Chaos Types
 *
 * Wire types, zod schemas and fixed protocol constants for the chaos
 * control plane.
 */

import { z } from 'zod';
import type { Logger } from '@chaosline/utils';

// =============================================================================
// Chaos Type
// =============================================================================

export const ChaosTypeSchema = z.enum(['LATENCY', 'HTTP_ERROR', 'KILL', 'NETWORK_ISOLATION']);
export type ChaosType = z.infer<typeof ChaosTypeSchema>;

// =============================================================================
// Scenario Parameters
// =============================================================================

/** Type-specific numeric parameters, in insertion order */
export type ScenarioParameters = Readonly<Record<string, number>>;

// =============================================================================
// Wire Payloads
// =============================================================================

export interface ScenarioWireMap {
  type: ChaosType;
  targetService: string;
  durationMs: number;
  parameters: Record<string, number>;
}

export interface StartExperimentPayload {
  experimentId: string;
  scenario: ScenarioWireMap;
}

export interface StopExperimentPayload {
  experimentId: string;
}

// =============================================================================
// Protocol Constants
// =============================================================================

export const CHAOS_CONNECT_TIMEOUT_MS = 5_000;
export const CHAOS_READ_TIMEOUT_MS = 10_000;
export const CHAOS_USER_AGENT = 'chaosline/chaos';

export const CHAOS_PATHS = {
  START: '/experiments/start',
  STOP: '/experiments/stop',
} as const;

export const DEFAULT_ENVIRONMENT_NAME = 'QA';
export const DEFAULT_PRODUCTION_MARKERS: readonly string[] = ['PROD'];

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Configuration provider consumed by the orchestrator. Both reads must be
 * synchronous and free of side effects.
 */
export interface ChaosEnvironment {
  chaosEndpoint(): string;
  currentEnvironmentName(): string;
}

/** Logging sink; any pino logger satisfies it. */
export type ChaosLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

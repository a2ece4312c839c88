/**
 * Environment-based Chaos Configuration
 *
 * Loads chaos configuration from environment variables, an optional .env
 * file, or a JSON file keyed by environment name.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { errorMessage } from '@chaosline/utils';

import { ConfigError } from '../errors';
import { ChaosOrchestrator } from '../orchestrator/chaos-orchestrator';
import { SafetyGate } from '../safety/safety-gate';
import { HttpChaosClient } from '../transport/http-client';
import {
  DEFAULT_ENVIRONMENT_NAME,
  DEFAULT_PRODUCTION_MARKERS,
  type ChaosEnvironment,
  type ChaosLogger,
} from '../types';

// =============================================================================
// Environment Variable Names
// =============================================================================

export const ENV_KEYS = {
  ENDPOINT: 'CHAOS_ENDPOINT',
  ENVIRONMENT: 'CHAOS_ENV',
  ENVIRONMENT_FALLBACK: 'TEST_ENV',
  ALLOW_PRODUCTION: 'CHAOS_ALLOW_PRODUCTION',
  PRODUCTION_MARKERS: 'CHAOS_PRODUCTION_MARKERS',
} as const;

// =============================================================================
// Helper Functions
// =============================================================================

function getEnv(key: string): string | undefined {
  return process.env[key];
}

function getEnvBool(key: string, defaultValue: boolean = false): boolean {
  const value = getEnv(key);
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvList(key: string, defaultValue: readonly string[]): string[] {
  const value = getEnv(key);
  if (value === undefined) return [...defaultValue];
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : [...defaultValue];
}

/**
 * Resolve the current environment name (trimmed, upper-cased)
 *
 * @throws {ConfigError} If the configured name is blank
 */
export function resolveEnvironmentName(): string {
  const raw =
    getEnv(ENV_KEYS.ENVIRONMENT) ?? getEnv(ENV_KEYS.ENVIRONMENT_FALLBACK) ?? DEFAULT_ENVIRONMENT_NAME;
  const name = raw.trim();
  if (!name) {
    throw new ConfigError('Environment name cannot be empty', ENV_KEYS.ENVIRONMENT);
  }
  return name.toUpperCase();
}

// =============================================================================
// Config Loaders
// =============================================================================

export interface ChaosConfig {
  endpoint?: string;
  environmentName: string;
  allowProductionOverride: boolean;
  productionMarkers: string[];
}

/**
 * Load chaos config from environment
 */
export function loadChaosConfigFromEnv(): ChaosConfig {
  const endpoint = getEnv(ENV_KEYS.ENDPOINT)?.trim();

  return {
    endpoint: endpoint ? endpoint : undefined,
    environmentName: resolveEnvironmentName(),
    allowProductionOverride: getEnvBool(ENV_KEYS.ALLOW_PRODUCTION),
    productionMarkers: getEnvList(ENV_KEYS.PRODUCTION_MARKERS, DEFAULT_PRODUCTION_MARKERS),
  };
}

/**
 * Load a .env file into process.env. Variables already set win.
 *
 * @returns Whether a file was loaded
 * @throws {ConfigError} If an explicitly named file cannot be read
 */
export function loadChaosEnvFile(path?: string): boolean {
  const result = dotenvConfig({ path: path ?? resolve(process.cwd(), '.env') });
  if (result.error) {
    if (path) {
      throw new ConfigError(`Failed to load env file ${path}: ${result.error.message}`, 'envFile');
    }
    return false;
  }
  return true;
}

// =============================================================================
// Environment Providers
// =============================================================================

/**
 * Reads process.env on every call
 */
export class EnvChaosEnvironment implements ChaosEnvironment {
  chaosEndpoint(): string {
    const endpoint = getEnv(ENV_KEYS.ENDPOINT)?.trim();
    if (!endpoint) {
      throw new ConfigError(`${ENV_KEYS.ENDPOINT} is not set`, ENV_KEYS.ENDPOINT);
    }
    return endpoint;
  }

  currentEnvironmentName(): string {
    return resolveEnvironmentName();
  }
}

const EnvironmentFileSchema = z.record(
  z
    .object({
      chaosEndpoint: z.string().trim().min(1).optional(),
    })
    .passthrough()
);

/**
 * JSON file keyed by environment name:
 * `{ "QA": { "chaosEndpoint": "http://chaos.qa.internal" } }`
 *
 * The file is read once; the environment name is still resolved per call.
 */
export class FileChaosEnvironment implements ChaosEnvironment {
  private readonly sections: Map<string, { chaosEndpoint?: string }>;

  /**
   * @throws {ConfigError} If the file is missing, not JSON, or malformed
   */
  constructor(private readonly filePath: string) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(
        `Failed to load environment config ${filePath}: ${errorMessage(error)}`,
        'configFile'
      );
    }

    const parsed = EnvironmentFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(
        `Invalid environment config ${filePath}: ${issue?.path.join('.')} ${issue?.message}`,
        'configFile'
      );
    }

    this.sections = new Map(
      Object.entries(parsed.data).map(([name, section]) => [name.trim().toUpperCase(), section])
    );
  }

  chaosEndpoint(): string {
    const environment = this.currentEnvironmentName();
    const section = this.sections.get(environment);
    if (!section) {
      throw new ConfigError(
        `No configuration found for environment: ${environment} in ${this.filePath}`,
        'configFile'
      );
    }
    if (!section.chaosEndpoint) {
      throw new ConfigError(
        `Missing chaosEndpoint for environment: ${environment} in ${this.filePath}`,
        'chaosEndpoint'
      );
    }
    return section.chaosEndpoint;
  }

  currentEnvironmentName(): string {
    return resolveEnvironmentName();
  }
}

// =============================================================================
// Orchestrator Factory
// =============================================================================

export interface ChaosFromEnvOptions {
  /** .env file to load first */
  envFile?: string;
  /** JSON environment file; process.env is used when omitted */
  configFile?: string;
  logger?: ChaosLogger;
}

/**
 * Create a ChaosOrchestrator wired from environment configuration
 *
 * @throws {ConfigError} If the chaos endpoint is missing or invalid
 */
export function createChaosOrchestratorFromEnv(options: ChaosFromEnvOptions = {}): ChaosOrchestrator {
  if (options.envFile) {
    loadChaosEnvFile(options.envFile);
  }

  const config = loadChaosConfigFromEnv();
  const environment: ChaosEnvironment = options.configFile
    ? new FileChaosEnvironment(options.configFile)
    : new EnvChaosEnvironment();

  return new ChaosOrchestrator({
    transport: new HttpChaosClient(environment.chaosEndpoint(), { logger: options.logger }),
    environment,
    allowProductionOverride: config.allowProductionOverride,
    safetyGate: new SafetyGate({
      productionMarkers: config.productionMarkers,
      logger: options.logger,
    }),
    logger: options.logger,
  });
}

// Singleton instance for suite-wide use
let defaultOrchestrator: ChaosOrchestrator | null = null;

/**
 * Get or create the shared orchestrator from environment configuration
 */
export function getChaosOrchestrator(): ChaosOrchestrator {
  if (!defaultOrchestrator) {
    defaultOrchestrator = createChaosOrchestratorFromEnv();
  }
  return defaultOrchestrator;
}

export function setChaosOrchestrator(orchestrator: ChaosOrchestrator): void {
  defaultOrchestrator = orchestrator;
}

/**
 * Reset the shared orchestrator (for testing)
 */
export function resetChaosOrchestrator(): void {
  defaultOrchestrator = null;
}

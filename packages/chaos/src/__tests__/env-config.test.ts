/**
 * Chaos Environment Configuration Tests
 */

import { fileURLToPath } from 'url';

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import {
  ENV_KEYS,
  EnvChaosEnvironment,
  FileChaosEnvironment,
  createChaosOrchestratorFromEnv,
  getChaosOrchestrator,
  loadChaosConfigFromEnv,
  loadChaosEnvFile,
  resetChaosOrchestrator,
  resolveEnvironmentName,
  setChaosOrchestrator,
} from '../config/env-config';
import { ConfigError, SafetyViolationError } from '../errors';
import { ChaosOrchestrator } from '../orchestrator/chaos-orchestrator';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const mockFetch = vi.fn();

const createMockLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('chaos env config', () => {
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of Object.values(ENV_KEYS)) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
    resetChaosOrchestrator();
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    for (const key of Object.values(ENV_KEYS)) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetChaosOrchestrator();
    vi.unstubAllGlobals();
  });

  describe('resolveEnvironmentName', () => {
    it('should default to QA', () => {
      expect(resolveEnvironmentName()).toBe('QA');
    });

    it('should trim and upper-case CHAOS_ENV', () => {
      process.env.CHAOS_ENV = ' staging ';
      expect(resolveEnvironmentName()).toBe('STAGING');
    });

    it('should fall back to TEST_ENV', () => {
      process.env.TEST_ENV = 'perf';
      expect(resolveEnvironmentName()).toBe('PERF');
    });

    it('should reject a blank name', () => {
      process.env.CHAOS_ENV = '  ';
      expect(() => resolveEnvironmentName()).toThrow(ConfigError);
    });
  });

  describe('loadChaosConfigFromEnv', () => {
    it('should return safe defaults when no env vars set', () => {
      expect(loadChaosConfigFromEnv()).toEqual({
        endpoint: undefined,
        environmentName: 'QA',
        allowProductionOverride: false,
        productionMarkers: ['PROD'],
      });
    });

    it('should parse every variable', () => {
      process.env.CHAOS_ENDPOINT = ' http://chaos.test ';
      process.env.CHAOS_ENV = 'prod';
      process.env.CHAOS_ALLOW_PRODUCTION = '1';
      process.env.CHAOS_PRODUCTION_MARKERS = 'PROD, PRODUCTION,,';

      expect(loadChaosConfigFromEnv()).toEqual({
        endpoint: 'http://chaos.test',
        environmentName: 'PROD',
        allowProductionOverride: true,
        productionMarkers: ['PROD', 'PRODUCTION'],
      });
    });

    it('should treat anything but true or 1 as no override', () => {
      process.env.CHAOS_ALLOW_PRODUCTION = 'yes';
      expect(loadChaosConfigFromEnv().allowProductionOverride).toBe(false);
    });
  });

  describe('EnvChaosEnvironment', () => {
    it('should read process.env on every call', () => {
      const environment = new EnvChaosEnvironment();

      process.env.CHAOS_ENV = 'qa';
      expect(environment.currentEnvironmentName()).toBe('QA');

      process.env.CHAOS_ENV = 'prod';
      expect(environment.currentEnvironmentName()).toBe('PROD');
    });

    it('should require CHAOS_ENDPOINT', () => {
      const environment = new EnvChaosEnvironment();

      expect(() => environment.chaosEndpoint()).toThrow('CHAOS_ENDPOINT is not set');

      process.env.CHAOS_ENDPOINT = 'http://chaos.test';
      expect(environment.chaosEndpoint()).toBe('http://chaos.test');
    });
  });

  describe('FileChaosEnvironment', () => {
    it('should resolve the endpoint for the current environment', () => {
      const environment = new FileChaosEnvironment(fixture('env-config.json'));

      expect(environment.chaosEndpoint()).toBe('http://chaos.qa.test');

      process.env.CHAOS_ENV = 'staging';
      expect(environment.chaosEndpoint()).toBe('http://chaos.staging.test/');
    });

    it('should fail for an environment without a section', () => {
      process.env.CHAOS_ENV = 'perf';
      const environment = new FileChaosEnvironment(fixture('env-config.json'));

      expect(() => environment.chaosEndpoint()).toThrow(
        `No configuration found for environment: PERF in ${fixture('env-config.json')}`
      );
    });

    it('should fail for a section without chaosEndpoint', () => {
      process.env.CHAOS_ENV = 'dev';
      const environment = new FileChaosEnvironment(fixture('env-config.json'));

      expect(() => environment.chaosEndpoint()).toThrow(ConfigError);
    });

    it('should fail for a missing or malformed file', () => {
      expect(() => new FileChaosEnvironment(fixture('does-not-exist.json'))).toThrow(ConfigError);
      expect(() => new FileChaosEnvironment(fixture('malformed-env-config.json'))).toThrow(
        ConfigError
      );
    });
  });

  describe('loadChaosEnvFile', () => {
    it('should load variables from a .env file', () => {
      expect(loadChaosEnvFile(fixture('chaos.env'))).toBe(true);

      expect(process.env.CHAOS_ENDPOINT).toBe('http://chaos.from-file.test');
      expect(resolveEnvironmentName()).toBe('STAGING');
    });

    it('should not override variables already set', () => {
      process.env.CHAOS_ENV = 'qa';
      loadChaosEnvFile(fixture('chaos.env'));

      expect(resolveEnvironmentName()).toBe('QA');
    });

    it('should fail for an explicit file that does not exist', () => {
      expect(() => loadChaosEnvFile(fixture('missing.env'))).toThrow(ConfigError);
    });
  });

  describe('createChaosOrchestratorFromEnv', () => {
    it('should fail without an endpoint', () => {
      expect(() => createChaosOrchestratorFromEnv({ logger: createMockLogger() })).toThrow(
        ConfigError
      );
    });

    it('should block production and make no request', async () => {
      process.env.CHAOS_ENDPOINT = 'http://chaos.test';
      process.env.CHAOS_ENV = 'PROD';
      const orchestrator = createChaosOrchestratorFromEnv({ logger: createMockLogger() });

      await expect(orchestrator.killService('auth-service', 5_000)).rejects.toThrow(
        SafetyViolationError
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should honour the production override from the environment', async () => {
      process.env.CHAOS_ENDPOINT = 'http://chaos.test';
      process.env.CHAOS_ENV = 'PROD';
      process.env.CHAOS_ALLOW_PRODUCTION = 'true';
      mockFetch.mockResolvedValue({ ok: true, status: 200, text: async () => '' });
      const orchestrator = createChaosOrchestratorFromEnv({ logger: createMockLogger() });

      const handle = await orchestrator.killService('auth-service', 5_000);
      await handle.close();

      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(mockFetch.mock.calls[0][0]).toBe('http://chaos.test/experiments/start');
      expect(mockFetch.mock.calls[1][0]).toBe('http://chaos.test/experiments/stop');
      expect(JSON.parse(mockFetch.mock.calls[1][1].body)).toEqual({ experimentId: handle.id });
    });

    it('should honour custom production markers', async () => {
      process.env.CHAOS_ENDPOINT = 'http://chaos.test';
      process.env.CHAOS_ENV = 'live';
      process.env.CHAOS_PRODUCTION_MARKERS = 'PROD,LIVE';
      const orchestrator = createChaosOrchestratorFromEnv({ logger: createMockLogger() });

      await expect(orchestrator.isolateNetwork('auth-service', 5_000)).rejects.toThrow(
        SafetyViolationError
      );
    });

    it('should read the endpoint from a JSON config file', async () => {
      process.env.CHAOS_ENV = 'staging';
      mockFetch.mockResolvedValue({ ok: true, status: 200, text: async () => '' });
      const orchestrator = createChaosOrchestratorFromEnv({
        configFile: fixture('env-config.json'),
        logger: createMockLogger(),
      });

      const handle = await orchestrator.injectLatency('search-service', 200, 30_000);
      await handle.close();

      expect(mockFetch.mock.calls[0][0]).toBe('http://chaos.staging.test/experiments/start');
    });
  });

  describe('shared orchestrator', () => {
    it('should create the shared instance lazily from env', () => {
      process.env.CHAOS_ENDPOINT = 'http://chaos.test';

      const first = getChaosOrchestrator();

      expect(first).toBeInstanceOf(ChaosOrchestrator);
      expect(getChaosOrchestrator()).toBe(first);
    });

    it('should allow replacing and resetting the shared instance', () => {
      process.env.CHAOS_ENDPOINT = 'http://chaos.test';
      const custom = createChaosOrchestratorFromEnv({ logger: createMockLogger() });

      setChaosOrchestrator(custom);
      expect(getChaosOrchestrator()).toBe(custom);

      resetChaosOrchestrator();
      expect(getChaosOrchestrator()).not.toBe(custom);
    });
  });
});

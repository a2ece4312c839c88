/**
 * HTTP Chaos Client
 *
 * Low-level client for the chaos control plane. Serializes scenarios and
 * issues start/stop calls. Holds no environment checks and no lifecycle;
 * those belong to ChaosOrchestrator.
 */

import { z } from 'zod';
import { createChildLogger, errorMessage, logger as rootLogger } from '@chaosline/utils';

import { ConfigError, TransportError, type TransportOperation } from '../errors';
import type { ChaosScenario } from '../scenario';
import {
  CHAOS_CONNECT_TIMEOUT_MS,
  CHAOS_PATHS,
  CHAOS_READ_TIMEOUT_MS,
  CHAOS_USER_AGENT,
  type ChaosLogger,
  type StartExperimentPayload,
  type StopExperimentPayload,
} from '../types';
import type { ChaosTransport } from './transport-interface';

const MAX_ERROR_BODY_LENGTH = 200;

const EndpointSchema = z
  .string({
    required_error: 'Chaos endpoint must not be null or empty',
    invalid_type_error: 'Chaos endpoint must not be null or empty',
  })
  .trim()
  .min(1, 'Chaos endpoint must not be null or empty')
  .url('Chaos endpoint must be an absolute URL')
  .refine(
    (value) => value.startsWith('http://') || value.startsWith('https://'),
    'Chaos endpoint must use http or https'
  );

export interface HttpChaosClientOptions {
  logger?: ChaosLogger;
}

// =============================================================================
// HTTP Chaos Client
// =============================================================================

export class HttpChaosClient implements ChaosTransport {
  readonly endpoint: string;

  private readonly logger: ChaosLogger;

  /**
   * @throws {ConfigError} If the endpoint is blank or not an http(s) URL
   */
  constructor(endpoint: string, options: HttpChaosClientOptions = {}) {
    const parsed = EndpointSchema.safeParse(endpoint);
    if (!parsed.success) {
      throw new ConfigError(
        parsed.error.issues[0]?.message ?? 'Invalid chaos endpoint',
        'chaosEndpoint'
      );
    }

    this.endpoint = parsed.data.replace(/\/+$/, '');
    this.logger = options.logger ?? createChildLogger(rootLogger, { component: 'chaos-client' });
  }

  async start(experimentId: string, scenario: ChaosScenario): Promise<void> {
    const payload: StartExperimentPayload = {
      experimentId,
      scenario: scenario.toWireMap(),
    };
    await this.post('start', experimentId, CHAOS_PATHS.START, payload);
  }

  async stop(experimentId: string): Promise<void> {
    const payload: StopExperimentPayload = { experimentId };
    await this.post('stop', experimentId, CHAOS_PATHS.STOP, payload);
  }

  /**
   * POST a JSON payload. The request phase is bounded by connect + read
   * timeouts and the body drain by the read timeout. The body is always
   * consumed so the socket goes back to the pool.
   */
  private async post(
    operation: TransportOperation,
    experimentId: string,
    path: string,
    payload: StartExperimentPayload | StopExperimentPayload
  ): Promise<void> {
    const url = `${this.endpoint}${path}`;
    const controller = new AbortController();
    const startTime = Date.now();
    let timedOut = false;

    const armTimer = (ms: number) =>
      setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, ms);

    let timer = armTimer(CHAOS_CONNECT_TIMEOUT_MS + CHAOS_READ_TIMEOUT_MS);
    let status: number | undefined;

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': CHAOS_USER_AGENT,
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      status = response.status;

      clearTimeout(timer);
      timer = armTimer(CHAOS_READ_TIMEOUT_MS);
      const body = await response.text();

      if (!response.ok) {
        throw new TransportError(
          operation,
          experimentId,
          `Chaos API call failed: HTTP ${response.status}` +
            (body ? `: ${body.slice(0, MAX_ERROR_BODY_LENGTH)}` : ''),
          { status: response.status }
        );
      }

      this.logger.debug(
        { experimentId, path, status: response.status, durationMs: Date.now() - startTime },
        'Chaos API call succeeded'
      );
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }

      if (timedOut) {
        throw new TransportError(
          operation,
          experimentId,
          `Chaos API request timed out: ${path}`,
          { status, cause: error }
        );
      }

      throw new TransportError(
        operation,
        experimentId,
        `Chaos API request failed: ${path}: ${errorMessage(error)}`,
        { status, cause: error }
      );
    } finally {
      clearTimeout(timer);
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createHttpChaosClient(
  endpoint: string,
  options?: HttpChaosClientOptions
): HttpChaosClient {
  return new HttpChaosClient(endpoint, options);
}

/**
 * Authenticated HTTP client for the downstream API (Microsoft Graph)
 *
 * Sends the downstream credential handed out by the gate; it never sees the
 * inbound credential.
 */

import type { z } from 'zod';
import type { DownstreamCredential } from '../../delegation/types.js';

export interface GraphClientOptions {
  baseUrl: string;
  timeoutMs: number;

  /** HTTP implementation (defaults to global fetch) */
  fetch?: typeof fetch;
}

export class DownstreamRequestError extends Error {
  constructor(
    message: string,
    readonly path: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'DownstreamRequestError';
  }
}

export class GraphClient {
  private readonly baseUrl: string;

  constructor(private readonly options: GraphClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  /**
   * GET `path` and validate the JSON body
   *
   * @throws {DownstreamRequestError} on non-2xx status, timeout, or an
   *   unexpected body shape
   */
  async get<T>(
    path: string,
    credential: DownstreamCredential,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const fetchImpl = this.options.fetch ?? fetch;

    let response: Response;
    try {
      response = await fetchImpl(`${this.baseUrl}${path}`, {
        method: 'GET',
        headers: {
          Authorization: `${credential.tokenType} ${credential.accessToken}`,
          Accept: 'application/json',
        },
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new DownstreamRequestError(
          `Downstream request timed out after ${this.options.timeoutMs}ms`,
          path
        );
      }
      throw new DownstreamRequestError(
        `Downstream request failed: ${error instanceof Error ? error.message : String(error)}`,
        path
      );
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      throw new DownstreamRequestError(
        `Downstream request failed with HTTP ${response.status}`,
        path,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new DownstreamRequestError('Downstream response is not JSON', path, response.status);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new DownstreamRequestError(
        'Downstream response has an unexpected shape',
        path,
        response.status
      );
    }
    return parsed.data;
  }
}

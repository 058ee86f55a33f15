/**
 * OpenID Provider Discovery
 *
 * Reads the issuer's `.well-known/openid-configuration` document once at
 * startup so the signing-key store knows where the JWKS lives.
 *
 * @see https://openid.net/specs/openid-connect-discovery-1_0.html
 */

import { z } from 'zod';
import { isSecurityError, SecurityErrors } from '../utils/errors.js';

const OpenIdConfigurationSchema = z
  .object({
    issuer: z.string().min(1),
    jwks_uri: z.string().url(),
    token_endpoint: z.string().url().optional(),
    authorization_endpoint: z.string().url().optional(),
    scopes_supported: z.array(z.string()).optional(),
  })
  .passthrough();

export type OpenIdConfiguration = z.infer<typeof OpenIdConfigurationSchema>;

/**
 * Fetch and validate an OpenID configuration document
 *
 * @throws {GateSecurityError} `TIMEOUT` or `KEY_FETCH_FAILED`
 */
export async function fetchOpenIdConfiguration(
  discoveryUrl: string,
  timeoutMs: number
): Promise<OpenIdConfiguration> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(discoveryUrl, {
      headers: { Accept: 'application/json' },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw SecurityErrors.KEY_FETCH_FAILED({
        cause: `HTTP ${response.status} from discovery endpoint`,
        discoveryUrl,
      });
    }

    const parsed = OpenIdConfigurationSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw SecurityErrors.KEY_FETCH_FAILED({
        cause: 'discovery document is missing issuer or jwks_uri',
        discoveryUrl,
      });
    }

    console.log(`[Discovery] Loaded OpenID configuration for issuer ${parsed.data.issuer}`);
    return parsed.data;
  } catch (error) {
    if (controller.signal.aborted) {
      throw SecurityErrors.TIMEOUT('OpenID discovery', timeoutMs);
    }
    if (isSecurityError(error)) {
      throw error;
    }
    throw SecurityErrors.KEY_FETCH_FAILED({
      cause: error instanceof Error ? error.message : String(error),
      discoveryUrl,
    });
  } finally {
    clearTimeout(timer);
  }
}

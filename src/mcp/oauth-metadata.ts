/**
 * OAuth 2.0 Protected Resource Metadata (RFC 9728)
 *
 * The tool server is a resource server; clients discover which authorization
 * servers issue credentials for it from this document. Everything here is
 * derived from static configuration, never from a request.
 *
 * - RFC 9728: https://datatracker.ietf.org/doc/html/rfc9728
 * - RFC 6750 §3: https://datatracker.ietf.org/doc/html/rfc6750#section-3
 */

import type { MetadataConfig } from '../config/schemas.js';

export const PROTECTED_RESOURCE_PATH = '/.well-known/oauth-protected-resource';

export interface ProtectedResourceMetadata {
  /** Resource server identifier */
  resource: string;

  /** Authorization servers that issue credentials for this resource */
  authorization_servers: string[];

  /** Scopes a client may request for this resource */
  scopes_supported: string[];

  /** Bearer token transmission methods supported */
  bearer_methods_supported: string[];

  /** Human-readable resource name */
  resource_name?: string;
}

/**
 * Build the protected resource metadata document
 *
 * @example
 * ```typescript
 * generateProtectedResourceMetadata({
 *   resource: 'https://mcp.example.com',
 *   authorizationServers: ['https://login.microsoftonline.com/<tenant>/v2.0'],
 *   scopesSupported: ['api://<client>/access_as_user'],
 * });
 * // {
 * //   resource: 'https://mcp.example.com',
 * //   authorization_servers: ['https://login.microsoftonline.com/<tenant>/v2.0'],
 * //   scopes_supported: ['api://<client>/access_as_user'],
 * //   bearer_methods_supported: ['header']
 * // }
 * ```
 */
export function generateProtectedResourceMetadata(
  config: Pick<MetadataConfig, 'resource' | 'authorizationServers'> &
    Partial<Pick<MetadataConfig, 'scopesSupported' | 'resourceName'>>
): ProtectedResourceMetadata {
  const metadata: ProtectedResourceMetadata = {
    resource: config.resource,
    authorization_servers: [...config.authorizationServers],
    scopes_supported: [...(config.scopesSupported ?? [])],
    bearer_methods_supported: ['header'],
  };

  if (config.resourceName) {
    metadata.resource_name = config.resourceName;
  }

  return metadata;
}

/**
 * FastMCP `oauth.protectedResource` option. FastMCP snake-cases the keys and
 * serves the result on the tool port at the well-known path, both bare and
 * suffixed with the stream endpoint.
 */
export type ProtectedResourceOption = {
  resource: string;
  authorizationServers: string[];
  scopesSupported: string[];
  bearerMethodsSupported: string[];
  resourceName?: string;
};

export function toProtectedResourceOption(
  config: Parameters<typeof generateProtectedResourceMetadata>[0]
): ProtectedResourceOption {
  const document = generateProtectedResourceMetadata(config);
  const option: ProtectedResourceOption = {
    resource: document.resource,
    authorizationServers: document.authorization_servers,
    scopesSupported: document.scopes_supported,
    bearerMethodsSupported: document.bearer_methods_supported,
  };

  if (document.resource_name) {
    option.resourceName = document.resource_name;
  }

  return option;
}

/**
 * URL at which the metadata document for `resource` is published
 */
export function resourceMetadataUrl(resource: string): string {
  return `${resource.replace(/\/+$/, '')}${PROTECTED_RESOURCE_PATH}`;
}

export interface WWWAuthenticateOptions {
  realm: string;

  /** OAuth error code, e.g. `invalid_token` or `insufficient_scope` */
  error?: string;

  /** Space-separated scopes, sent with `insufficient_scope` */
  scope?: string;

  errorDescription?: string;

  /** RFC 9728 `resource_metadata` parameter */
  resourceMetadata?: string;
}

/**
 * Generate a Bearer challenge for 401/403 responses
 *
 * Parameter order: realm, error, scope, error_description, resource_metadata
 *
 * @example
 * ```typescript
 * generateWWWAuthenticateHeader({
 *   realm: 'mcp',
 *   error: 'insufficient_scope',
 *   scope: 'User.Read Mail.Read',
 *   resourceMetadata: 'https://mcp.example.com/.well-known/oauth-protected-resource',
 * });
 * // 'Bearer realm="mcp", error="insufficient_scope", scope="User.Read Mail.Read",
 * //  resource_metadata="https://mcp.example.com/.well-known/oauth-protected-resource"'
 * ```
 */
export function generateWWWAuthenticateHeader(options: WWWAuthenticateOptions): string {
  const params: string[] = [`realm="${quote(options.realm)}"`];

  if (options.error) {
    params.push(`error="${quote(options.error)}"`);
  }
  if (options.scope) {
    params.push(`scope="${quote(options.scope)}"`);
  }
  if (options.errorDescription) {
    params.push(`error_description="${quote(options.errorDescription)}"`);
  }
  if (options.resourceMetadata) {
    params.push(`resource_metadata="${quote(options.resourceMetadata)}"`);
  }

  return `Bearer ${params.join(', ')}`;
}

// quoted-string per RFC 7230 §3.2.6
function quote(value: string): string {
  return value.replace(/["\\]/g, '\\$&');
}

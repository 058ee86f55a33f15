/**
 * Secret Provider Interface
 *
 * A provider resolves a logical secret name (e.g. "AZURE_CLIENT_SECRET") from
 * one source. Providers are chained by SecretResolver; returning undefined
 * hands the lookup to the next provider.
 */

export interface ISecretProvider {
  /**
   * @returns the secret, or undefined when this source does not hold it
   * @throws only for unexpected failures (permission errors, I/O faults)
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(obj: unknown): obj is ISecretProvider {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'resolve' in obj &&
    typeof obj.resolve === 'function'
  );
}

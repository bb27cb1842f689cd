/**
 * Settings Loader
 *
 * Turns the host's configuration blob and decrypted secret map into
 * immutable bridge settings. Performs no I/O.
 */

import { DEFAULT_CONFIG } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { ConfigurationBlob, SecretBundle, SecretMap, Settings } from './types/settings.js';

function decodeConfiguration(configuration: ConfigurationBlob): Record<string, unknown> {
  if (!(typeof configuration === 'string' || configuration instanceof Uint8Array)) {
    return configuration;
  }

  const text =
    typeof configuration === 'string' ? configuration : new TextDecoder().decode(configuration);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text === '' ? '{}' : text);
  } catch (error) {
    throw new ConfigurationError(
      `could not unmarshal settings json: ${errorMessage(error)}`,
      'INVALID_SETTINGS',
      undefined,
      error instanceof Error ? error : undefined
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError('settings json must be an object', 'INVALID_SETTINGS');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function optionalString(raw: Record<string, unknown>, key: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${key} must be a string`, 'INVALID_SETTINGS');
  }
  return value;
}

/**
 * Read the API key from the decrypted secret map
 * @throws ConfigurationError if the key is missing or empty
 */
export function loadSecrets(secrets: SecretMap | undefined): SecretBundle {
  const apiKey = secrets?.apiKey;
  if (apiKey === undefined || apiKey === '') {
    throw new ConfigurationError('apiKey is missing or empty', 'SECRET_MISSING');
  }
  return { apiKey };
}

/**
 * Load and validate bridge settings
 *
 * @example
 * ```typescript
 * const settings = loadSettings('{"path":"http://localhost:3000"}', { apiKey: 'test-secret' });
 * ```
 */
export function loadSettings(configuration: ConfigurationBlob, secrets: SecretMap | undefined): Settings {
  const raw = decodeConfiguration(configuration);

  const path = raw.path;
  if (typeof path !== 'string' || path === '') {
    throw new ConfigurationError('path is required', 'INVALID_SETTINGS');
  }
  if (!path.startsWith('http://') && !path.startsWith('https://')) {
    throw new ConfigurationError('path must start with http:// or https://', 'INVALID_SETTINGS');
  }

  const settings: Settings = {
    path,
    healthPath: optionalString(raw, 'healthPath', DEFAULT_CONFIG.healthPath),
    metricsPath: optionalString(raw, 'metricsPath', DEFAULT_CONFIG.metricsPath),
    secrets: Object.freeze(loadSecrets(secrets)),
  };

  // Keep the API key out of JSON.stringify(settings)
  Object.defineProperty(settings, 'toJSON', {
    enumerable: false,
    value: () => ({
      path: settings.path,
      healthPath: settings.healthPath,
      metricsPath: settings.metricsPath,
    }),
  });

  return Object.freeze(settings);
}

/**
 * Resolve one of the settings' paths against the base URL
 * @throws TypeError if the result is not a valid URL
 */
export function resolveEndpoint(settings: Settings, endpointPath: string): string {
  const base = settings.path.endsWith('/') ? settings.path : `${settings.path}/`;
  const relative = endpointPath.startsWith('/') ? endpointPath.slice(1) : endpointPath;
  return new URL(relative, base).toString();
}

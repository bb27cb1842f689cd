/**
 * Settings Types
 */

/** Secrets derived from the decrypted secret map. Never logged or serialized. */
export interface SecretBundle {
  apiKey: string;
}

/** Validated bridge settings */
export interface Settings {
  /** Base URL of the monitored system */
  readonly path: string;
  /** Liveness path, resolved against `path` (default: /api/health) */
  readonly healthPath: string;
  /** Scrape path, resolved against `path` (default: /metrics) */
  readonly metricsPath: string;
  readonly secrets?: Readonly<SecretBundle>;
}

/** Raw configuration blob as supplied by the host */
export type ConfigurationBlob = string | Uint8Array | Record<string, unknown>;

/** Raw decrypted secret map as supplied by the host */
export type SecretMap = Record<string, string | undefined>;

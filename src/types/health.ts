/**
 * Health Types
 */

export type HealthStatus = 'ok' | 'error';

export interface HealthVerdict {
  status: HealthStatus;
  message: string;
}

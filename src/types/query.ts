/**
 * Query Types
 */

/** Opaque query payload as delivered by the host */
export type QueryPayload = string | Uint8Array | Record<string, unknown>;

/** One query of a batch */
export interface DataQuery {
  /** Identifier the response entry is keyed by */
  refId: string;
  /** JSON payload decoding to `{ metric: string }` */
  payload: QueryPayload;
}

/** Decoded query */
export interface Query {
  refId: string;
  metric: string;
}

/** One-row columnar record for a located metric */
export interface MetricFrame {
  metric_name: string;
  metric_value: number;
}

/** Exactly one of frame or error is set */
export type DataResponse = { frame: MetricFrame; error?: never } | { error: string; frame?: never };

/** Response entries keyed by query refId */
export type ResponseEnvelope = Record<string, DataResponse>;

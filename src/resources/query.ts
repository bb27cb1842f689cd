/**
 * Query Resource
 *
 * Answers a batch of metric queries from a single scrape.
 */

import { TransportError, ValidationError, errorMessage } from '../errors.js';
import type { ScrapeOutcome } from '../types/metrics.js';
import type { DataQuery, DataResponse, Query, QueryPayload, ResponseEnvelope } from '../types/query.js';
import { findMetric } from '../utils/exposition.js';
import type { QueryOutcomeLabel } from '../utils/instrumentation.js';
import type { CallOptions, ResourceContext } from './context.js';
import type { MetricsResource } from './metrics.js';

function parsePayload(payload: QueryPayload): unknown {
  if (!(typeof payload === 'string' || payload instanceof Uint8Array)) {
    return payload;
  }
  const text = typeof payload === 'string' ? payload : new TextDecoder().decode(payload);
  return JSON.parse(text);
}

/**
 * Decode one query payload
 *
 * An absent or empty `metric` decodes to an empty name.
 *
 * @throws ValidationError if the payload is not a JSON object or `metric` is not a string
 */
export function decodeQuery(dataQuery: DataQuery): Query {
  let parsed: unknown;
  try {
    parsed = parsePayload(dataQuery.payload);
  } catch (error) {
    throw new ValidationError(
      `failed to unmarshal query JSON: ${errorMessage(error)}`,
      'INVALID_QUERY',
      { refId: dataQuery.refId },
      error instanceof Error ? error : undefined
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError('query JSON must be an object', 'INVALID_QUERY', {
      refId: dataQuery.refId,
    });
  }

  const metric: unknown = Reflect.get(parsed, 'metric');
  if (metric !== undefined && metric !== null && typeof metric !== 'string') {
    throw new ValidationError('metric must be a string', 'INVALID_QUERY', {
      refId: dataQuery.refId,
    });
  }

  return { refId: dataQuery.refId, metric: typeof metric === 'string' ? metric : '' };
}

function toResponse(outcome: ScrapeOutcome): [DataResponse, QueryOutcomeLabel] {
  switch (outcome.kind) {
    case 'found':
      return [
        { frame: { metric_name: outcome.sample.name, metric_value: outcome.sample.value } },
        'ok',
      ];
    case 'not_found':
      return [{ error: `metric ${outcome.name} not found` }, 'not_found'];
    case 'malformed_value':
      return [
        { error: `metric ${outcome.name} has malformed value "${outcome.raw}"` },
        'malformed_value',
      ];
  }
}

export class QueryResource {
  constructor(
    private readonly context: ResourceContext,
    private readonly metrics: MetricsResource
  ) {}

  /**
   * Execute a query batch.
   *
   * The first non-empty metric name in batch order is the batch metric, and
   * every query in the batch is answered with it; other names are ignored.
   * The scrape endpoint is fetched once per batch and every query gets exactly
   * one entry keyed by its refId.
   *
   * @throws ValidationError if a payload cannot be decoded, refIds repeat or no
   * query names a metric (no scrape is made)
   */
  async execute(batch: readonly DataQuery[], options: CallOptions = {}): Promise<ResponseEnvelope> {
    let queries: Query[];
    let batchMetric: string;
    try {
      [queries, batchMetric] = this.validate(batch);
    } catch (error) {
      for (let i = 0; i < batch.length; i++) {
        this.context.instrumentation?.recordQuery('invalid');
      }
      throw error;
    }

    let response: DataResponse;
    let label: QueryOutcomeLabel;
    try {
      const document = await this.metrics.scrape(options);
      [response, label] = toResponse(findMetric(document, batchMetric));
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      this.context.debug?.('Scrape failed', { error: error.message, code: error.code });
      response = { error: error.message };
      label = 'transport_error';
    }

    const envelope: ResponseEnvelope = {};
    for (const { refId } of queries) {
      envelope[refId] = response;
      this.context.instrumentation?.recordQuery(label);
    }

    return envelope;
  }

  private validate(batch: readonly DataQuery[]): [Query[], string] {
    const seen = new Set<string>();
    for (const { refId } of batch) {
      if (seen.has(refId)) {
        throw new ValidationError(`duplicate query refId: ${refId}`, 'DUPLICATE_REF_ID', { refId });
      }
      seen.add(refId);
    }

    const queries = batch.map((dataQuery) => decodeQuery(dataQuery));

    const batchMetric = queries.find((query) => query.metric !== '')?.metric;
    if (batchMetric === undefined) {
      throw new ValidationError('no metric specified in the query', 'NO_METRIC');
    }
    return [queries, batchMetric];
  }
}

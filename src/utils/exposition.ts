/**
 * Exposition Text Parser
 *
 * Reads `<metric_name> <value>` lines out of a plain-text metrics document.
 * Only unlabelled, timestamp-free samples are recognised; lines carrying a
 * label set or a timestamp are skipped.
 */

import type { MetricSample, ScrapeOutcome } from '../types/metrics.js';

const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY = /^([+-]?)inf(?:inity)?$/i;

/**
 * Parse a sample value token as a float64
 * @returns the number, or undefined when the token is not a float
 */
export function parseSampleValue(token: string): number | undefined {
  if (/^nan$/i.test(token)) {
    return Number.NaN;
  }
  const inf = INFINITY.exec(token);
  if (inf) {
    return inf[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  if (!FLOAT.test(token)) {
    return undefined;
  }
  return Number(token);
}

/**
 * Split a line into tokens. A line with leading whitespace yields an empty
 * first token, so it never matches a metric name.
 */
function tokenize(line: string): string[] {
  const trimmed = line.trimEnd();
  if (trimmed === '' || trimmed.startsWith('#')) {
    return [];
  }
  return trimmed.split(/\s+/);
}

/**
 * Read a line as a `<name> <value>` pair
 * @returns undefined for comments, label sets, timestamps and invalid names
 */
function simpleSample(line: string): [name: string, raw: string] | undefined {
  const [name, raw, ...rest] = tokenize(line);
  if (name === undefined || raw === undefined || rest.length > 0 || !METRIC_NAME.test(name)) {
    return undefined;
  }
  return [name, raw];
}

/**
 * Locate the first `<name> <value>` line for a metric
 *
 * Matching is exact and case-sensitive on the whole name token, so `foo`
 * does not match `foo_bar 1` or `foo2 1`. A name that is not a valid metric
 * name is never found.
 */
export function findMetric(document: string, name: string): ScrapeOutcome {
  if (!METRIC_NAME.test(name)) {
    return { kind: 'not_found', name };
  }

  for (const line of document.split('\n')) {
    const sample = simpleSample(line);
    if (sample === undefined || sample[0] !== name) {
      continue;
    }

    const raw = sample[1];
    const value = parseSampleValue(raw);
    if (value === undefined) {
      return { kind: 'malformed_value', name, raw };
    }
    return { kind: 'found', sample: { name, value } };
  }

  return { kind: 'not_found', name };
}

/**
 * Collect every simple sample in document order
 *
 * Lines with an invalid name or an unparsable value are skipped.
 */
export function parseExposition(document: string): MetricSample[] {
  const samples: MetricSample[] = [];

  for (const line of document.split('\n')) {
    const sample = simpleSample(line);
    if (sample === undefined) {
      continue;
    }
    const [name, raw] = sample;
    const value = parseSampleValue(raw);
    if (value !== undefined) {
      samples.push({ name, value });
    }
  }

  return samples;
}

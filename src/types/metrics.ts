/**
 * Metrics Types
 */

/** One `<name> <value>` line located in a scraped document */
export interface MetricSample {
  name: string;
  value: number;
}

/** Result of looking up a metric name in a scraped document */
export type ScrapeOutcome =
  | { kind: 'found'; sample: MetricSample }
  | { kind: 'not_found'; name: string }
  | { kind: 'malformed_value'; name: string; raw: string };

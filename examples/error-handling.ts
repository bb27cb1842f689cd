/**
 * Error Handling Example
 *
 * Shows which failures are thrown and which come back as values.
 *
 * Run with: npx tsx examples/error-handling.ts
 */

import {
  MetricsBridge,
  ConfigurationError,
  ValidationError,
  TransportError,
  MetricNotFoundError,
  isBridgeError,
} from '../src/index.js';

async function main() {
  console.log('=== Metrics Bridge Error Handling Example ===\n');

  // Example 1: Configuration errors stop construction
  console.log('1. Constructing without an API key...');
  try {
    new MetricsBridge({ configuration: { path: 'http://localhost:3000' }, secrets: {} });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.log(`   ConfigurationError: ${error.message} (${error.code})`);
    }
  }
  console.log();

  const bridge = new MetricsBridge({
    configuration: { path: process.env.MONITOR_URL || 'http://localhost:3000' },
    secrets: { apiKey: process.env.MONITOR_API_KEY || 'test-secret' },
    http: { timeout: 2000 },
  });

  // Example 2: A batch naming no metric is rejected as a whole
  console.log('2. Querying without a metric...');
  try {
    await bridge.query([{ refId: 'A', payload: {} }]);
  } catch (error) {
    if (error instanceof ValidationError) {
      console.log(`   ValidationError: ${error.message}`);
    }
  }
  console.log();

  // Example 3: Health problems are values, not exceptions
  console.log('3. Checking health...');
  const health = await bridge.checkHealth();
  console.log(`   ${health.status}: ${health.message}\n`);

  // Example 4: Per-query failures land in the envelope
  console.log('4. Querying a metric that may not exist...');
  const envelope = await bridge.query([{ refId: 'A', payload: { metric: 'missing_metric' } }]);
  console.log(`   ${JSON.stringify(envelope)}\n`);

  // Example 5: The throwing lookup
  console.log('5. Reading a metric directly...');
  try {
    const sample = await bridge.metrics.get('missing_metric');
    console.log(`   ${sample.name} = ${sample.value}`);
  } catch (error) {
    if (error instanceof MetricNotFoundError) {
      console.log(`   MetricNotFoundError: ${error.metricName}`);
    } else if (error instanceof TransportError) {
      console.log(`   TransportError: ${error.message} (retryable: ${error.isRetryable()})`);
    } else if (isBridgeError(error)) {
      console.log(`   ${error.name}: ${error.message}`);
    } else {
      throw error;
    }
  }

  await bridge.dispose();
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});

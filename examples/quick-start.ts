/**
 * Quick Start Example
 *
 * Checks a monitored endpoint and reads one metric from its scrape endpoint.
 *
 * Run with: npx tsx examples/quick-start.ts
 */

import { BridgeMetrics, MetricsBridge } from '../src/index.js';

async function main() {
  const instrumentation = new BridgeMetrics();

  const bridge = new MetricsBridge({
    configuration: {
      path: process.env.MONITOR_URL || 'http://localhost:3000',
      metricsPath: process.env.MONITOR_METRICS_URL || '/metrics',
    },
    secrets: { apiKey: process.env.MONITOR_API_KEY },
    http: { timeout: 5000 },
    instrumentation,
    debug: process.env.DEBUG === '1',
  });

  console.log('=== Metrics Bridge Quick Start ===\n');

  // 1. Liveness
  console.log('1. Checking health...');
  const health = await bridge.checkHealth();
  console.log(`   ${health.status}: ${health.message}\n`);

  // 2. One metric
  const metric = process.argv[2] || 'go_threads';
  console.log(`2. Querying ${metric}...`);
  const envelope = await bridge.query([{ refId: 'A', payload: { metric } }]);
  const entry = envelope.A;
  if (entry?.frame) {
    console.log(`   ${entry.frame.metric_name} = ${entry.frame.metric_value}\n`);
  } else {
    console.log(`   error: ${entry?.error}\n`);
  }

  // 3. Bridge's own counters
  console.log('3. Bridge counters:');
  console.log(await instrumentation.expose());

  await bridge.dispose();
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});

/**
 * Client, orchestrator and assembler wired to a FakeBulkServer.
 */

import { BulkClient } from '../../client/index.js';
import { BulkBridgeConfigBuilder } from '../../config/index.js';
import { createInMemoryObservability } from '../../observability/index.js';
import { JobOrchestrator } from '../../orchestrator/job-orchestrator.js';
import { ResultAssembler } from '../../orchestrator/result-assembler.js';
import type { PollIntervalPolicy } from '../../resilience/polling.js';
import { FakeBulkServer } from './fake-bulk-server.js';

export interface HarnessOptions {
  pollPolicy?: PollIntervalPolicy;
  pageSize?: number;
  uploadLimitBytes?: number;
  concurrency?: number;
}

export function createHarness(options: HarnessOptions = {}) {
  const server = new FakeBulkServer();
  const observability = createInMemoryObservability();
  const builder = new BulkBridgeConfigBuilder()
    .withInstanceUrl('https://fake.example.com')
    .withAccessToken('test-token')
    .withApiVersion('60.0')
    .withRetryConfig({ maxRetries: 2, initialBackoffMs: 10, maxBackoffMs: 100 });
  if (options.uploadLimitBytes !== undefined) {
    builder.withUploadLimitBytes(options.uploadLimitBytes);
  }
  const config = builder.build();

  const retrySleeps: number[] = [];
  const client = new BulkClient(config, {
    fetch: server.fetch,
    observability,
    sleep: async (ms) => {
      retrySleeps.push(ms);
    },
  });

  // Virtual time: the clock only moves when the poller sleeps
  let now = 0;
  const pollSleeps: number[] = [];
  const orchestrator = new JobOrchestrator(client, {
    pollPolicy: options.pollPolicy,
    pageSize: options.pageSize,
    clock: { now: () => now },
    sleep: async (ms) => {
      pollSleeps.push(ms);
      now += ms;
    },
  });
  const assembler = new ResultAssembler(orchestrator, {
    concurrency: options.concurrency,
    logger: observability.logger,
  });

  return { server, observability, config, client, orchestrator, assembler, pollSleeps, retrySleeps };
}

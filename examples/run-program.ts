/**
 * Example: submit a program, poll its status by hand, then fetch the samples.
 */

import { CircuitJobsClient } from '../src/client';
import { loadConfigFromEnv } from '../src/config';
import type { Program } from '../src/circuit/program';

async function main() {
  const client = new CircuitJobsClient(loadConfigFromEnv());

  const program: Program = {
    name: 'displacement',
    version: '1.0',
    modes: 2,
    operations: [
      { name: 'Dgate', params: [0.5], modes: [0] },
      { name: 'MeasureFock', params: [], modes: [0, 1] }
    ]
  };

  if (!(await client.connection.ping())) {
    console.error('Platform is not reachable at', client.connection.baseUrl);
    process.exitCode = 1;
    return;
  }

  const job = await client.connection.createJob(process.env.TARGET ?? 'chip2', program, 10);
  console.log('Submitted job:', job.toString());

  while (!job.isFinal) {
    await new Promise((resolve) => setTimeout(resolve, client.config.pollIntervalMs));
    await job.refresh();
    console.log('Job status:', job.status);
  }

  if (job.status === 'complete') {
    console.log('Samples:', JSON.stringify(job.result.samples));
  }
}

main().catch(console.error);

/**
 * Submit a task graph through the coordinator and print the results
 *
 * Usage: node dist/scripts/run-task-graph.js examples/task-graph.json [timeoutMs]
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { HttpTransport } from '../transport/httpTransport';
import { describeError } from '../transport/errors';
import { Coordinator } from '../orchestrator';
import { readNumber } from '../config/relayConfig';
import { TaskGraph, TaskGraphSchema } from '../types/taskTypes';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

async function main() {
  const file = process.argv[2];
  if (!file) {
    console.error('Usage: run-task-graph <graph.json> [timeoutMs]');
    process.exit(1);
  }

  const timeoutMs = readNumber(
    { timeout: process.argv[3] ?? process.env.WAIT_TIMEOUT_MS },
    'timeout',
    0,
  );

  let graph: TaskGraph;
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(file), 'utf8'));
    graph = TaskGraphSchema.parse(raw);
  } catch (error) {
    console.error(`Failed to read task graph ${file}: ${describeError(error)}`);
    process.exit(1);
  }

  const coordinator = new Coordinator({ transport: new HttpTransport() });

  try {
    await coordinator.start();
    const taskIds = await coordinator.submitTask(graph);
    console.log(`\nSubmitted ${taskIds.length} tasks: ${taskIds.join(', ')}\n`);

    const results = await coordinator.waitForCompletion({
      pollIntervalMs: 250,
      ...(timeoutMs > 0 && { timeoutMs }),
    });

    console.log('Results:');
    console.log('========\n');
    for (const [taskId, result] of Object.entries(results)) {
      const record = coordinator.getTaskRecord(taskId);
      console.log(`[${taskId}] (${record?.agent ?? 'unknown'}, ${record?.status ?? 'unknown'})`);
      console.log(`${typeof result === 'string' ? result : JSON.stringify(result, null, 2)}\n`);
    }
    process.exitCode = 0;
  } catch (error) {
    console.error('Task graph failed:', describeError(error));
    process.exitCode = 1;
  } finally {
    await coordinator.stop();
  }
}

void main();

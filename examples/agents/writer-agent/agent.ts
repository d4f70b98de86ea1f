import {
  PRIVATE_SCOPE_URI,
  type AgentClient,
  type QueryResult,
  type TaskContext,
  type TaskRef,
} from '../../../src/client/index.js';
import { sleep } from '../../../src/utils/retry.js';

export const DRAFT_KEY = 'draft_article_001';

export interface WriterOptions {
  pollIntervalMs?: number;
  /** Give up after this many empty polls */
  maxPolls?: number;
  log?: (line: string) => void;
}

/**
 * Wait for a delegated task, read the research notes shared with it, store an
 * article draft and report completion. Resolves null when no task arrived.
 */
export async function runWriterAgent(client: AgentClient, options: WriterOptions = {}): Promise<TaskRef | null> {
  const log = options.log ?? console.log;
  const task = await waitForTask(client, options.pollIntervalMs ?? 2000, options.maxPolls ?? 30);
  if (!task) {
    log('No task arrived; exiting.');
    return null;
  }
  log(`Received task: ${task.objective}`);

  const sharedScope = task.shared_scopes[0];
  if (!sharedScope) {
    return client.complete({ taskId: task.task_id, status: 'failure', error: 'No shared scope to read from' });
  }

  const notes = await client.query('Latest research logs', [sharedScope]);
  log(`Read ${notes.length} notes from ${sharedScope}`);

  await client.store(PRIVATE_SCOPE_URI, DRAFT_KEY, composeArticle(task.objective, notes));
  log('Article draft saved.');

  return client.complete({ taskId: task.task_id, status: 'success', outputMemoryKey: DRAFT_KEY });
}

export function composeArticle(objective: string, notes: QueryResult[]): string {
  const findings = notes
    .slice()
    .sort((a, b) => a.key.localeCompare(b.key))
    .map(note => `- ${typeof note.value === 'string' ? note.value : JSON.stringify(note.value)}`);

  return [
    '# Quantum Computing: A Deep Dive',
    '',
    `_${objective}_`,
    '',
    '## Findings',
    ...findings,
    '',
  ].join('\n');
}

async function waitForTask(client: AgentClient, pollIntervalMs: number, maxPolls: number): Promise<TaskContext | null> {
  for (let attempt = 0; attempt < maxPolls; attempt++) {
    const task = await client.currentTask();
    if (task) return task;
    if (attempt < maxPolls - 1) await sleep(pollIntervalMs);
  }
  return null;
}

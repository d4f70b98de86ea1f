import { PRIVATE_SCOPE_URI, type AgentClient, type TaskRef } from '../../../src/client/index.js';

export const WRITER_AGENT_ID = 'writer-agent-v1';

export const RESEARCH_NOTES: ReadonlyArray<{ key: string; text: string }> = [
  { key: 'research_log_001', text: 'Quantum computing uses qubits that can hold superpositions of states.' },
  { key: 'research_log_002', text: 'Key applications include cryptography and optimization.' },
  { key: 'research_log_003', text: 'Several hardware approaches compete: superconducting, trapped ion, photonic.' },
];

/**
 * Store research notes in the agent's private scope, then delegate the write-up
 * to the writer, sharing that scope with it.
 */
export async function runResearchAgent(
  client: AgentClient,
  log: (line: string) => void = console.log,
): Promise<TaskRef> {
  log("Researching 'Quantum Computing'...");
  for (const note of RESEARCH_NOTES) {
    await client.store(PRIVATE_SCOPE_URI, note.key, note.text);
  }
  log(`Saved ${RESEARCH_NOTES.length} notes to memory.`);

  const task = await client.delegate({
    targetAgentId: WRITER_AGENT_ID,
    objective: 'Summarize my research logs into a 3-paragraph blog post.',
    sharedScopes: [PRIVATE_SCOPE_URI],
    priority: 'high',
  });
  log(`Writer is now working on task ${task.task_id} (${task.status})`);
  return task;
}

import { AgentClient } from '../../../src/client/index.js';
import { runWriterAgent } from './agent.js';

await runWriterAgent(AgentClient.fromEnv());

import { AgentClient } from '../../../src/client/index.js';
import { runResearchAgent } from './agent.js';

await runResearchAgent(AgentClient.fromEnv());

import {
  InputGuardrailTripwireTriggered,
  assistant,
  run,
  user,
  withTrace,
  type Agent,
  type AgentInputItem,
} from '@openai/agents';
import { createMcpClients, createTravelAgents, listMcpClients } from './agents';
import { agentClassifier, createTravelGuardrail, createTravelGuardrailAgent } from './guardrail';
import { getConfig, type AppConfig } from '../config/config';
import { createLogger, type Logger } from '../utils/logger';
import { errorMessage, type AssistantReply, type ChatMessage } from '../types/types';

export const TRACE_NAME = 'AI Travel Assistant Workflow';

export const BLOCKED_REPLY =
  'I can only help with travel-related questions and greetings. Please ask about weather, accommodations, places to visit, or trip planning.';
export const ERROR_REPLY = 'I encountered an error while processing your request. Please try again.';

export interface RunOutcome {
  finalOutput?: unknown;
  lastAgent?: { name: string };
}

/** Runs the controller; swapped out in tests so no model is called. */
export type RunExecutor = (agent: Agent, input: AgentInputItem[]) => Promise<RunOutcome>;

export const runWithAgents: RunExecutor = (agent, input) => run(agent, input);

export interface AssistantDeps {
  config?: AppConfig;
  execute?: RunExecutor;
  logger?: Logger;
}

// Convert stored history -> AgentInputItems
export function historyToItems(history: ChatMessage[]): AgentInputItem[] {
  return history.map((m) => (m.role === 'user' ? user(m.text) : assistant(m.text)));
}

export function outputText(output: unknown): string {
  if (output === undefined || output === null) return '';
  if (Array.isArray(output)) return output.map(String).join('\n');
  return typeof output === 'string' ? output : JSON.stringify(output);
}

export class TravelAssistant {
  private readonly config: AppConfig;
  private readonly execute: RunExecutor;
  private readonly log: Logger;

  constructor(deps: AssistantDeps = {}) {
    this.config = deps.config ?? getConfig();
    this.execute = deps.execute ?? runWithAgents;
    this.log = deps.logger ?? createLogger('assistant');
  }

  /**
   * Answers one user message in the context of the prior conversation.
   * MCP clients live for a single query: connected first, always closed after.
   */
  async processUserQuery(text: string, history: ChatMessage[] = []): Promise<AssistantReply> {
    const servers = createMcpClients(this.config);
    const clients = listMcpClients(servers);

    try {
      return await withTrace(TRACE_NAME, async () => {
        await Promise.all(clients.map((c) => c.connect()));

        const guardrail = createTravelGuardrail(
          agentClassifier(createTravelGuardrailAgent(this.config.GUARDRAIL_MODEL)),
          this.log.child('guardrail')
        );
        const agents = createTravelAgents(servers, { model: this.config.AGENT_MODEL, guardrail });

        const result = await this.execute(agents.controller, [...historyToItems(history), user(text)]);
        const agent = result.lastAgent?.name;
        this.log.debug(`answered by ${agent ?? 'unknown agent'}`);
        return { text: outputText(result.finalOutput), agent };
      });
    } catch (err) {
      if (err instanceof InputGuardrailTripwireTriggered) {
        this.log.warn(`Guardrail blocked this input: ${errorMessage(err)}`);
        return { text: BLOCKED_REPLY, blocked: true };
      }
      this.log.error('Error processing query:', err);
      return { text: ERROR_REPLY };
    } finally {
      await this.closeAll(clients);
    }
  }

  private async closeAll(clients: ReturnType<typeof listMcpClients>): Promise<void> {
    const results = await Promise.allSettled(clients.map((c) => c.close()));
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        this.log.warn(`closing ${clients[i]?.name ?? 'MCP client'} failed: ${errorMessage(r.reason)}`);
      }
    });
  }
}

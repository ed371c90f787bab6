import { Agent, run, type AgentInputItem, type InputGuardrail } from '@openai/agents';
import { z } from 'zod';
import { AGENT_PROMPTS } from './prompts';
import { createLogger, type Logger } from '../utils/logger';

export const TravelCheckOutput = z.object({
  is_travel_query: z.boolean(),
  is_greeting: z.boolean(),
  reasoning: z.string(),
});

export type TravelCheck = z.infer<typeof TravelCheckOutput>;

export type TravelClassifier = (text: string) => Promise<TravelCheck>;

// travel questions and greetings pass; anything else trips the wire
export function shouldTripwire(check: TravelCheck): boolean {
  return !(check.is_travel_query || check.is_greeting);
}

/** The newest user message; the classifier only judges what the user just said. */
export function latestUserText(input: string | AgentInputItem[]): string {
  if (typeof input === 'string') return input;
  for (let i = input.length - 1; i >= 0; i--) {
    const item = input[i];
    if (!item || !('role' in item) || item.role !== 'user') continue;
    const { content } = item;
    if (typeof content === 'string') return content;
    return content.map((part) => ('text' in part && typeof part.text === 'string' ? part.text : '')).join('');
  }
  return '';
}

export function createTravelGuardrailAgent(model: string) {
  return new Agent({
    name: 'Travel Guardrail Checker',
    model,
    instructions: AGENT_PROMPTS.GUARDRAIL,
    outputType: TravelCheckOutput,
  });
}

export function agentClassifier(agent: ReturnType<typeof createTravelGuardrailAgent>): TravelClassifier {
  return async (text) => {
    const result = await run(agent, text);
    const output = result.finalOutput;
    if (!output) throw new Error('guardrail agent returned no output');
    return output;
  };
}

export interface TravelCheckResult {
  outputInfo: string;
  tripwireTriggered: boolean;
}

export async function checkTravelInput(
  input: string | AgentInputItem[],
  classify: TravelClassifier,
  logger: Logger = createLogger('guardrail')
): Promise<TravelCheckResult> {
  // classifier errors propagate and end the run
  const check = await classify(latestUserText(input));
  const tripwireTriggered = shouldTripwire(check);
  if (tripwireTriggered) logger.info(`blocked: ${check.reasoning}`);
  return { outputInfo: check.reasoning, tripwireTriggered };
}

export function createTravelGuardrail(classify: TravelClassifier, logger?: Logger): InputGuardrail {
  return {
    name: 'travel_query_guardrail',
    execute: ({ input }) => checkTravelInput(input, classify, logger),
  };
}

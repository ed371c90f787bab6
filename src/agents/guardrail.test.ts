import { assistant, user } from '@openai/agents';
import { describe, expect, it, vi } from 'vitest';
import {
  checkTravelInput,
  createTravelGuardrail,
  createTravelGuardrailAgent,
  latestUserText,
  shouldTripwire,
  type TravelCheck,
} from './guardrail';
import { createLogger } from '../utils/logger';

const logger = createLogger('test:guardrail');
const verdict = (is_travel_query: boolean, is_greeting: boolean, reasoning = 'because'): TravelCheck => ({
  is_travel_query,
  is_greeting,
  reasoning,
});

describe('shouldTripwire', () => {
  it('lets travel questions and greetings through', () => {
    expect(shouldTripwire(verdict(true, false))).toBe(false);
    expect(shouldTripwire(verdict(false, true))).toBe(false);
    expect(shouldTripwire(verdict(true, true))).toBe(false);
    expect(shouldTripwire(verdict(false, false))).toBe(true);
  });
});

describe('latestUserText', () => {
  it('reads plain input as is', () => {
    expect(latestUserText('hello')).toBe('hello');
  });

  it('takes the newest user message from a history', () => {
    expect(latestUserText([user('Hotels in Rome?'), assistant('Which dates?'), user('Next weekend')])).toBe('Next weekend');
    expect(latestUserText([])).toBe('');
  });
});

describe('checkTravelInput', () => {
  it('classifies only the newest message', async () => {
    const classify = vi.fn(async () => verdict(true, false, 'asks about lodging'));

    const result = await checkTravelInput([user('Hi'), assistant('Hello!'), user('Any hostels in Porto?')], classify, logger);

    expect(classify).toHaveBeenCalledWith('Any hostels in Porto?');
    expect(result).toEqual({ outputInfo: 'asks about lodging', tripwireTriggered: false });
  });

  it('trips on off-topic input', async () => {
    const result = await checkTravelInput('Solve 2x + 3 = 7', async () => verdict(false, false, 'math homework'), logger);

    expect(result).toEqual({ outputInfo: 'math homework', tripwireTriggered: true });
  });

  it('passes classifier errors on to the run', async () => {
    const check = checkTravelInput(
      'Weather in Oslo?',
      async () => {
        throw new Error('rate limited');
      },
      logger
    );

    await expect(check).rejects.toThrow('rate limited');
  });
});

describe('guardrail wiring', () => {
  it('names the guardrail and its classifier agent', () => {
    expect(createTravelGuardrail(async () => verdict(true, false)).name).toBe('travel_query_guardrail');

    const agent = createTravelGuardrailAgent('gpt-4o-mini');
    expect(agent.name).toBe('Travel Guardrail Checker');
    expect(agent.model).toBe('gpt-4o-mini');
  });
});

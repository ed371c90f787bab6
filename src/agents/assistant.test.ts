import type { Server } from 'node:http';
import {
  Agent,
  InputGuardrailTripwireTriggered,
  assistant,
  setTracingDisabled,
  user,
  type AgentInputItem,
} from '@openai/agents';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import {
  BLOCKED_REPLY,
  ERROR_REPLY,
  TravelAssistant,
  historyToItems,
  outputText,
  type RunExecutor,
} from './assistant';
import { loadConfig } from '../config/config';
import { startServers } from '../servers/serve';
import { SERVER_NAMES } from '../servers/registry';
import { closeServer } from '../utils/http-server';
import { createLogger } from '../utils/logger';

setTracingDisabled(true);

const logger = createLogger('test:assistant');

describe('historyToItems', () => {
  it('maps stored turns onto agent input items', () => {
    const items = historyToItems([
      { role: 'user', text: 'Hi', at: '2030-01-01T00:00:00.000Z' },
      { role: 'assistant', text: 'Hello!', at: '2030-01-01T00:00:01.000Z', agent: 'controller_agent' },
    ]);

    expect(items).toEqual([user('Hi'), assistant('Hello!')]);
  });
});

describe('outputText', () => {
  it('renders whatever the run produced as text', () => {
    expect(outputText('Sunny')).toBe('Sunny');
    expect(outputText(undefined)).toBe('');
    expect(outputText(null)).toBe('');
    expect(outputText(['a', 'b'])).toBe('a\nb');
    expect(outputText({ days: 3 })).toBe('{"days":3}');
  });
});

describe('TravelAssistant', () => {
  let servers: Server[] = [];
  let urls: Record<string, string> = {};

  beforeAll(async () => {
    servers = await startServers({ targets: [...SERVER_NAMES], port: 0, host: '127.0.0.1' }, loadConfig({}));
    const urlOf = (i: number) => {
      const address = servers[i]?.address();
      if (!address || typeof address === 'string') throw new Error('not listening');
      return `http://127.0.0.1:${address.port}/mcp`;
    };
    urls = {
      WEATHER_SERVER_URL: urlOf(0),
      BOOKING_SERVER_URL: urlOf(1),
      PLACES_SERVER_URL: urlOf(2),
      PLANNER_SERVER_URL: urlOf(3),
    };
  });

  afterAll(async () => {
    await Promise.all(servers.map((s) => closeServer(s)));
  });

  it('runs the controller with history and connected specialists', async () => {
    const calls: { agent: string; input: AgentInputItem[] }[] = [];
    const tools: Record<string, string[]> = {};

    const execute: RunExecutor = async (agent, input) => {
      calls.push({ agent: agent.name, input });
      for (const handoff of agent.handoffs) {
        if (!(handoff instanceof Agent)) continue;
        const [server] = handoff.mcpServers;
        tools[handoff.name] = server ? (await server.listTools()).map((t) => t.name).sort() : [];
      }
      return { finalOutput: 'Expect sunshine in Lisbon.', lastAgent: { name: 'weather_agent' } };
    };

    const bot = new TravelAssistant({ config: loadConfig(urls), execute, logger });
    const reply = await bot.processUserQuery('Weather in Lisbon?', [
      { role: 'user', text: 'Hi', at: '2030-01-01T00:00:00.000Z' },
      { role: 'assistant', text: 'Hello! Where to?', at: '2030-01-01T00:00:01.000Z', agent: 'controller_agent' },
    ]);

    expect(reply).toEqual({ text: 'Expect sunshine in Lisbon.', agent: 'weather_agent' });
    expect(calls).toEqual([
      {
        agent: 'controller_agent',
        input: [user('Hi'), assistant('Hello! Where to?'), user('Weather in Lisbon?')],
      },
    ]);
    expect(tools).toEqual({
      weather_agent: ['check_weather', 'get_best_trip_days', 'get_weather_events', 'get_weather_forecast'],
      booking_agent: ['get_accommodation_details', 'search_availability', 'search_specific_accommodations'],
      places_agent: [
        'geocode_location',
        'recommend_places_by_distance',
        'recommend_places_by_weather',
        'reverse_geocode',
        'search_places',
      ],
      planner_agent: ['plan_complete_trip', 'plan_weather_optimized_trip', 'suggest_daily_activities'],
    });
  });

  it('answers blocked input with the fixed refusal', async () => {
    const execute: RunExecutor = async () => {
      throw new InputGuardrailTripwireTriggered('Input guardrail triggered', {
        guardrail: { type: 'input', name: 'travel_query_guardrail' },
        output: { tripwireTriggered: true, outputInfo: 'off topic' },
      });
    };

    const bot = new TravelAssistant({ config: loadConfig(urls), execute, logger });

    expect(await bot.processUserQuery('Write me a poem about taxes')).toEqual({ text: BLOCKED_REPLY, blocked: true });
  });

  it('turns run failures into the apology reply', async () => {
    const execute: RunExecutor = async () => {
      throw new Error('model overloaded');
    };

    const bot = new TravelAssistant({ config: loadConfig(urls), execute, logger });

    expect(await bot.processUserQuery('Hotels in Rome?')).toEqual({ text: ERROR_REPLY });
  });

  it('does not run the agents when a server is unreachable', async () => {
    let ran = false;
    const execute: RunExecutor = async () => {
      ran = true;
      return { finalOutput: 'unreachable' };
    };

    const bot = new TravelAssistant({
      config: loadConfig({ ...urls, PLACES_SERVER_URL: 'http://127.0.0.1:9/mcp' }),
      execute,
      logger,
    });

    expect(await bot.processUserQuery('Museums in Paris?')).toEqual({ text: ERROR_REPLY });
    expect(ran).toBe(false);
  });
});

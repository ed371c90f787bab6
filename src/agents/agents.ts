import { Agent, MCPServerStreamableHttp, type InputGuardrail } from '@openai/agents';
import { RECOMMENDED_PROMPT_PREFIX } from '@openai/agents-core/extensions';
import { AGENT_PROMPTS, HANDOFF_DESCRIPTIONS } from './prompts';
import type { AppConfig } from '../config/config';

export interface TravelMcpServers {
  weather: MCPServerStreamableHttp;
  booking: MCPServerStreamableHttp;
  places: MCPServerStreamableHttp;
  planner: MCPServerStreamableHttp;
}

export interface TravelAgents {
  controller: Agent;
  weather: Agent;
  booking: Agent;
  places: Agent;
  planner: Agent;
}

export interface TravelAgentOptions {
  model: string;
  guardrail?: InputGuardrail;
}

/** One streamable-HTTP MCP client per specialist; not connected yet. */
export function createMcpClients(config: AppConfig): TravelMcpServers {
  const client = (name: string, url: string) => new MCPServerStreamableHttp({ name, url, cacheToolsList: true });
  return {
    weather: client('Weather', config.WEATHER_SERVER_URL),
    booking: client('Booking', config.BOOKING_SERVER_URL),
    places: client('Places', config.PLACES_SERVER_URL),
    planner: client('Planner', config.PLANNER_SERVER_URL),
  };
}

export function listMcpClients(servers: TravelMcpServers): MCPServerStreamableHttp[] {
  return [servers.weather, servers.booking, servers.places, servers.planner];
}

/**
 * Controller hands off to the four specialists; each specialist owns one MCP
 * server and can hand back to the controller.
 */
export function createTravelAgents(servers: TravelMcpServers, options: TravelAgentOptions): TravelAgents {
  const { model, guardrail } = options;

  const controller = new Agent({
    name: 'controller_agent',
    model,
    instructions: `${RECOMMENDED_PROMPT_PREFIX}\n\n${AGENT_PROMPTS.CONTROLLER}`,
    handoffDescription: HANDOFF_DESCRIPTIONS.CONTROLLER,
    inputGuardrails: guardrail ? [guardrail] : [],
  });

  const specialist = (name: string, prompt: string, handoffDescription: string, server: MCPServerStreamableHttp) =>
    new Agent({
      name,
      model,
      instructions: `${RECOMMENDED_PROMPT_PREFIX}\n\n${prompt}`,
      handoffDescription,
      mcpServers: [server],
      handoffs: [controller],
    });

  const weather = specialist('weather_agent', AGENT_PROMPTS.WEATHER, HANDOFF_DESCRIPTIONS.WEATHER, servers.weather);
  const booking = specialist('booking_agent', AGENT_PROMPTS.BOOKING, HANDOFF_DESCRIPTIONS.BOOKING, servers.booking);
  const places = specialist('places_agent', AGENT_PROMPTS.PLACES, HANDOFF_DESCRIPTIONS.PLACES, servers.places);
  const planner = specialist('planner_agent', AGENT_PROMPTS.PLANNER, HANDOFF_DESCRIPTIONS.PLANNER, servers.planner);

  // the graph is cyclic, so the controller's handoffs are filled in last
  controller.handoffs = [weather, booking, places, planner];

  return { controller, weather, booking, places, planner };
}

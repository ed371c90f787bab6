/**
 * Travel Assistant Type Definitions
 * Shared shapes for the MCP services, the agents and the chat store
 */

import { z } from 'zod';

// ============= Location Types =============

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/** A free-text place name, or a point the caller already resolved. */
export type LocationInput = string | Coordinates;

export function isCoordinates(location: LocationInput): location is Coordinates {
  return typeof location !== 'string';
}

// ============= Weather Types =============

export interface ScoredDay {
  date: string;
  score: number;
  maxTemp: number | null;
  precip: number | null;
}

export type WeatherEventType = 'Heavy Rain' | 'Strong Winds' | 'Thunderstorm' | 'Snow';

export interface WeatherEvent {
  time: string;
  type: WeatherEventType;
  value: string;
}

// ============= Trip Planning Types =============

export type TimeOfDay = 'morning' | 'afternoon' | 'evening';

export interface Activity {
  type: string;
  time: TimeOfDay;
  name: string;
  rating: number;
  address: string;
  placeId: string;
  priceLevel: number;
}

export interface DayPlan {
  date: string;
  dayName: string;
  activities: Activity[];
}

export interface AccommodationSuggestion {
  name: string;
  rating: number;
  pricePerNight: number;
  currency: string;
  totalCost: number;
  checkIn: string;
  checkOut: string;
  nights: number;
}

// ============= Conversation Memory Types =============

export const ChatMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  text: z.string(),
  at: z.string(),
  agent: z.string().optional(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

export const ChatRecordSchema = z.object({
  chatId: z.string(),
  createdAt: z.string(),
  messages: z.array(ChatMessageSchema),
});

export type ChatRecord = z.infer<typeof ChatRecordSchema>;

// ============= Agent Types =============

export interface AssistantReply {
  text: string;
  agent?: string;
  blocked?: boolean;
}

// ============= Error Types =============

export class TravelAgentError extends Error {
  constructor(
    message: string,
    public code: ErrorCodes,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TravelAgentError';
  }
}

export enum ErrorCodes {
  INVALID_INPUT = 'INVALID_INPUT',
  LOCATION_NOT_FOUND = 'LOCATION_NOT_FOUND',
  MISSING_API_KEY = 'MISSING_API_KEY',
  EXTERNAL_API_ERROR = 'EXTERNAL_API_ERROR',
  NOT_FOUND = 'NOT_FOUND',
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

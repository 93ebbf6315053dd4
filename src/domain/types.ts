export interface Query {
  readonly text: string;
  readonly receivedAt: string;
}

export type EmbeddingVector = number[];

export interface Chunk {
  documentId: string;
  index: number;
  text: string;
  start: number;
  end: number;
}

export interface IndexEntry {
  vector: EmbeddingVector;
  chunk: Chunk;
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export type RetrievalResult = ScoredChunk[];

export interface RouteSignals {
  weatherCues: string[];
  documentCues: string[];
  place: string | null;
}

export type DocumentRouteReason =
  | "document_cues"
  | "no_cues"
  | "ambiguous"
  | "unresolved_place";

export type RouteDecision =
  | { route: "weather"; place: string; signals: RouteSignals }
  | { route: "document_qa"; reason: DocumentRouteReason; signals: RouteSignals };

export interface WeatherReport {
  place: string;
  temperatureC: number;
  feelsLikeC: number;
  condition: string;
  humidity: number;
  windSpeedKmph: number;
  windSpeedMph: number;
  observedAt: string | null;
}

interface AnswerBase {
  query: string;
  text: string;
  latencyMs: number;
}

export interface WeatherAnswer extends AnswerBase {
  provenance: "weather";
  status: "ok";
  place: string;
  report: WeatherReport;
}

export interface WeatherFailureAnswer extends AnswerBase {
  provenance: "weather";
  status: "not_found" | "unavailable";
  place: string;
  error: string;
}

export interface DocumentAnswer extends AnswerBase {
  provenance: "document_qa";
  status: "ok" | "no_context";
  retrieval: RetrievalResult;
}

export interface DocumentFailureAnswer extends AnswerBase {
  provenance: "document_qa";
  status: "retrieval_failed" | "generation_failed" | "index_unavailable";
  retrieval: RetrievalResult;
  error: string;
}

export type Answer =
  | WeatherAnswer
  | WeatherFailureAnswer
  | DocumentAnswer
  | DocumentFailureAnswer;

export function createQuery(text: string, now: Date = new Date()): Query {
  return Object.freeze({ text, receivedAt: now.toISOString() });
}

export function elapsedSince(query: Query, now: number = Date.now()): number {
  return Math.max(0, now - Date.parse(query.receivedAt));
}

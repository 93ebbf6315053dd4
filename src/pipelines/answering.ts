import { GenerationError, describeError } from "../domain/errors.js";
import {
  DocumentAnswer,
  Query,
  RetrievalResult,
  WeatherAnswer,
  WeatherReport,
  elapsedSince,
} from "../domain/types.js";
import { ChatModel } from "../infra/ai/types.js";

export const DEFAULT_ANSWER_TEMPERATURE = 0.2;

export const NO_CONTEXT_ANSWER =
  "I could not find any relevant information about that in the indexed documents.";

const DOCUMENT_SYSTEM_PROMPT = [
  "Answer the question based only on the provided context.",
  "Be concise and accurate.",
  "If the context does not contain the answer, say that it is not covered.",
].join(" ");

const WEATHER_SYSTEM_PROMPT = [
  "You report current weather conditions.",
  "Use only the figures provided and keep the answer to a few sentences.",
].join(" ");

export interface SynthesisDeps {
  chatModel: ChatModel;
  temperature?: number;
  signal?: AbortSignal;
}

export function synthesize(
  query: Query,
  context: RetrievalResult,
  deps: SynthesisDeps,
): Promise<DocumentAnswer>;
export function synthesize(
  query: Query,
  context: WeatherReport,
  deps: SynthesisDeps,
): Promise<WeatherAnswer>;
export async function synthesize(
  query: Query,
  context: RetrievalResult | WeatherReport,
  deps: SynthesisDeps,
): Promise<DocumentAnswer | WeatherAnswer> {
  if (Array.isArray(context)) {
    // Nothing retrieved means nothing to ground on; the model is not consulted.
    if (context.length === 0) {
      return {
        provenance: "document_qa",
        status: "no_context",
        query: query.text,
        text: NO_CONTEXT_ANSWER,
        retrieval: [],
        latencyMs: elapsedSince(query),
      };
    }

    const text = await generate(deps, DOCUMENT_SYSTEM_PROMPT, buildDocumentPrompt(query, context));
    return {
      provenance: "document_qa",
      status: "ok",
      query: query.text,
      text,
      retrieval: context,
      latencyMs: elapsedSince(query),
    };
  }

  const text = await generate(deps, WEATHER_SYSTEM_PROMPT, buildWeatherPrompt(query, context));
  return {
    provenance: "weather",
    status: "ok",
    query: query.text,
    text,
    place: context.place,
    report: context,
    latencyMs: elapsedSince(query),
  };
}

export function buildDocumentPrompt(query: Query, retrieval: RetrievalResult): string {
  const contextBlock = retrieval
    .map((hit, idx) => `[${idx + 1}] (${hit.chunk.documentId}#${hit.chunk.index})\n${hit.chunk.text.trim()}`)
    .join("\n\n");

  return `Context:\n${contextBlock}\n\nQuestion: ${query.text}\n\nAnswer:`;
}

export function buildWeatherPrompt(query: Query, report: WeatherReport): string {
  return [
    `Current conditions for ${report.place}:`,
    `temperature_c: ${report.temperatureC}`,
    `feels_like_c: ${report.feelsLikeC}`,
    `condition: ${report.condition}`,
    `humidity_percent: ${report.humidity}`,
    `wind_kmph: ${report.windSpeedKmph}`,
    `wind_mph: ${report.windSpeedMph}`,
    report.observedAt ? `observed_at: ${report.observedAt}` : null,
    "",
    `Question: ${query.text}`,
    "",
    "Answer:",
  ]
    .filter((line): line is string => line !== null)
    .join("\n");
}

export function formatWeatherReport(report: WeatherReport): string {
  return [
    `Weather in ${report.place}:`,
    `- Temperature: ${report.temperatureC}°C (feels like ${report.feelsLikeC}°C)`,
    `- Condition: ${report.condition}`,
    `- Humidity: ${report.humidity}%`,
    `- Wind Speed: ${report.windSpeedMph} mph (${report.windSpeedKmph} km/h)`,
  ].join("\n");
}

async function generate(deps: SynthesisDeps, system: string, prompt: string): Promise<string> {
  let text: string;
  try {
    text = await deps.chatModel.complete({
      system,
      prompt,
      temperature: deps.temperature ?? DEFAULT_ANSWER_TEMPERATURE,
      signal: deps.signal,
    });
  } catch (error) {
    if (error instanceof GenerationError) {
      throw error;
    }
    throw new GenerationError(`Answer generation failed: ${describeError(error)}`, {
      cause: error,
    });
  }

  if (!text.trim()) {
    throw new GenerationError("The language model returned an empty answer.");
  }
  return text.trim();
}

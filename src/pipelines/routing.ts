import { Query, RouteDecision, RouteSignals } from "../domain/types.js";
import { collapseWhitespace, tokenize } from "../utils/text.js";

const WEATHER_CUES = new Set([
  "weather",
  "temperature",
  "temperatures",
  "forecast",
  "climate",
  "rain",
  "raining",
  "rainy",
  "snow",
  "snowing",
  "sunny",
  "cloudy",
  "humidity",
  "humid",
  "wind",
  "windy",
  "celsius",
  "fahrenheit",
  "degrees",
  "umbrella",
  "storm",
  "stormy",
  "thunderstorm",
  "fog",
  "foggy",
  "precipitation",
]);

const DOCUMENT_CUES = new Set([
  "company",
  "companies",
  "business",
  "organization",
  "organisation",
  "document",
  "documents",
  "pdf",
  "report",
  "profile",
  "service",
  "services",
  "product",
  "products",
  "solution",
  "solutions",
  "client",
  "clients",
  "customer",
  "customers",
  "policy",
  "policies",
  "team",
  "mission",
  "vision",
  "founded",
  "headquarters",
  "healthcare",
  "expertise",
  "portfolio",
  "project",
  "projects",
]);

// Document cues that read as weather phrasing right after a weather cue,
// as in "weather report" or "forecast service".
const WEATHER_COMPOUND_TAILS = new Set(["report", "service", "services"]);

const PLACE_PREPOSITION = /\b(?:in|for|at|near|around)\s+/gi;

const TRAILING_NOISE =
  /\s+(?:today|tonight|tomorrow|now|right now|currently|at the moment|this (?:morning|afternoon|evening|week|weekend)|please|like)$/i;

const NOT_A_PLACE = new Set([
  "today",
  "tonight",
  "tomorrow",
  "now",
  "the moment",
  "noon",
  "midnight",
  "night",
  "the morning",
  "the afternoon",
  "the evening",
  "the weekend",
  "all",
  "general",
  "detail",
  "details",
]);

const QUESTION_WORDS = new Set([
  "what",
  "what's",
  "whats",
  "how",
  "how's",
  "is",
  "will",
  "does",
  "tell",
  "show",
  "give",
  "current",
  "today's",
  "tomorrow's",
]);

export interface RouteOptions {
  /** Used when weather cues fire but no place can be read from the text. */
  defaultPlace?: string | null;
}

/**
 * Pure keyword classifier. Weather wins only when weather cues fire, no
 * document cue does, and a place is known; every other combination falls
 * back to the document path.
 */
export function route(query: Query, options: RouteOptions = {}): RouteDecision {
  const signals = readSignals(query.text);
  const hasWeather = signals.weatherCues.length > 0;
  const hasDocument = signals.documentCues.length > 0;

  if (hasWeather && hasDocument) {
    return { route: "document_qa", reason: "ambiguous", signals };
  }
  if (hasDocument) {
    return { route: "document_qa", reason: "document_cues", signals };
  }
  if (!hasWeather) {
    return { route: "document_qa", reason: "no_cues", signals };
  }

  const place = signals.place ?? options.defaultPlace?.trim() ?? null;
  if (!place) {
    return { route: "document_qa", reason: "unresolved_place", signals };
  }
  return { route: "weather", place, signals };
}

export function readSignals(text: string): RouteSignals {
  const tokens = tokenize(text);
  return {
    weatherCues: collectCues(tokens, WEATHER_CUES),
    documentCues: collectCues(
      tokens.filter(
        (token, i) => !(WEATHER_COMPOUND_TAILS.has(token) && WEATHER_CUES.has(tokens[i - 1] ?? "")),
      ),
      DOCUMENT_CUES,
    ),
    place: extractPlace(text),
  };
}

/**
 * Reads a place name from phrasing such as "weather in New York today" or
 * "Tokyo forecast". Returns null when nothing plausible is found.
 */
export function extractPlace(text: string): string | null {
  const normalized = collapseWhitespace(text.replace(/’/g, "'"));
  if (!normalized) {
    return null;
  }

  const candidates = readPrepositionCandidates(normalized);
  const capitalized = candidates.find((candidate) => /^\p{Lu}/u.test(candidate));
  if (capitalized) {
    return capitalized;
  }
  if (candidates.length > 0) {
    return candidates[candidates.length - 1];
  }

  return readLeadingPlace(normalized);
}

function readPrepositionCandidates(text: string): string[] {
  const matches = [...text.matchAll(PLACE_PREPOSITION)];
  const candidates: string[] = [];

  for (let i = 0; i < matches.length; i += 1) {
    const match = matches[i];
    const start = (match.index ?? 0) + match[0].length;
    const end = matches[i + 1]?.index ?? text.length;
    const candidate = cleanPlace(text.slice(start, end));
    if (candidate) {
      candidates.push(candidate);
    }
  }

  return candidates;
}

function readLeadingPlace(text: string): string | null {
  const match = text.match(
    /(\p{Lu}[\p{L}'.-]*(?:\s+\p{Lu}[\p{L}'.-]*)*)\s+(?:weather|forecast|temperature|climate)\b/u,
  );
  if (!match) {
    return null;
  }

  const words = match[1].split(" ");
  while (words.length > 0 && QUESTION_WORDS.has(words[0].toLowerCase())) {
    words.shift();
  }
  return cleanPlace(words.join(" "));
}

function cleanPlace(raw: string): string | null {
  let place = raw
    .replace(/[?!.,;:"]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();

  let previous = "";
  while (place !== previous) {
    previous = place;
    place = place.replace(TRAILING_NOISE, "").trim();
  }
  if (NOT_A_PLACE.has(place.toLowerCase())) {
    return null;
  }
  place = place.replace(/^the\s+/i, "").trim();

  if (!place || NOT_A_PLACE.has(place.toLowerCase())) {
    return null;
  }
  if (tokenize(place).every((token) => WEATHER_CUES.has(token))) {
    return null;
  }
  return place;
}

function collectCues(tokens: string[], table: Set<string>): string[] {
  const seen: string[] = [];
  for (const token of tokens) {
    if (table.has(token) && !seen.includes(token)) {
      seen.push(token);
    }
  }
  return seen;
}

import { z } from "zod";
import { NetworkError, NotFoundError, describeError } from "../../domain/errors.js";
import { WeatherReport } from "../../domain/types.js";
import { LookupOptions, WeatherLookup } from "../../domain/weatherLookup.js";
import { isTimeoutError, withTimeout } from "../../utils/abort.js";
import { parseJson } from "../../utils/http.js";
import { collapseWhitespace, toTitleCase } from "../../utils/text.js";
import { FetchFn } from "../ai/types.js";

export const DEFAULT_WEATHER_TIMEOUT_MS = 15_000;

interface WttrClientOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs?: number;
  fetch?: FetchFn;
}

const currentConditionSchema = z.object({
  temp_C: z.coerce.number(),
  FeelsLikeC: z.coerce.number(),
  humidity: z.coerce.number(),
  windspeedKmph: z.coerce.number(),
  windspeedMiles: z.coerce.number(),
  weatherDesc: z.array(z.object({ value: z.string() })).default([]),
  localObsDateTime: z.string().optional(),
});

const payloadSchema = z.object({
  current_condition: z.array(z.unknown()).optional(),
});

/** Current conditions from wttr.in's `format=j1` JSON. No API key needed. */
export class WttrClient implements WeatherLookup {
  private readonly fetchImpl: FetchFn;

  constructor(private readonly options: WttrClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async lookup(place: string, options: LookupOptions = {}): Promise<WeatherReport> {
    const normalized = normalizePlace(place);
    if (!normalized) {
      throw new NotFoundError("No place name was given for the weather lookup.");
    }

    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs ?? DEFAULT_WEATHER_TIMEOUT_MS;
    const url = `${this.options.baseUrl}/${encodeURIComponent(normalized)}?format=j1`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          "User-Agent": this.options.userAgent,
        },
        signal: withTimeout(timeoutMs, options.signal),
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new NetworkError(`Weather request for ${normalized} timed out after ${timeoutMs}ms.`, {
          cause: error,
        });
      }
      throw new NetworkError(`Weather request for ${normalized} failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (response.status === 404 || response.status === 400) {
      throw new NotFoundError(`Unknown location: ${normalized}.`);
    }
    if (!response.ok) {
      throw new NetworkError(`Weather service responded with status ${response.status}.`);
    }

    let raw: string;
    try {
      raw = await response.text();
    } catch (error) {
      throw new NetworkError(`Weather response for ${normalized} could not be read: ${describeError(error)}`, {
        cause: error,
      });
    }
    if (/unknown location/i.test(raw)) {
      throw new NotFoundError(`Unknown location: ${normalized}.`);
    }
    const body = parseJson(raw);
    if (body === null) {
      throw new NetworkError("Weather service returned a non-JSON response.");
    }

    const payload = payloadSchema.safeParse(body);
    const first = payload.success ? payload.data.current_condition?.[0] : undefined;
    if (first === undefined) {
      throw new NotFoundError(`No current conditions were reported for ${normalized}.`);
    }

    const current = currentConditionSchema.safeParse(first);
    if (!current.success) {
      throw new NetworkError("Weather service returned malformed current conditions.");
    }

    return {
      place: toTitleCase(normalized),
      temperatureC: current.data.temp_C,
      feelsLikeC: current.data.FeelsLikeC,
      condition: current.data.weatherDesc[0]?.value.trim() || "Unknown",
      humidity: current.data.humidity,
      windSpeedKmph: current.data.windspeedKmph,
      windSpeedMph: current.data.windspeedMiles,
      observedAt: current.data.localObsDateTime ?? null,
    };
  }
}

export function normalizePlace(place: string): string {
  return collapseWhitespace(place).replace(/^[\s"'`.,;:!?]+|[\s"'`.,;:!?]+$/g, "");
}

import { WeatherReport } from "./types.js";

export interface LookupOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Resolves a place name to current conditions. Rejects with
 * `NotFoundError` for unknown places and `NetworkError` for transient
 * failures.
 */
export interface WeatherLookup {
  lookup(place: string, options?: LookupOptions): Promise<WeatherReport>;
}

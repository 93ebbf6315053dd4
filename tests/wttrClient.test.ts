import { describe, expect, it, vi } from "vitest";
import { NetworkError, NotFoundError } from "../src/domain/errors.js";
import { FetchFn } from "../src/infra/ai/types.js";
import { WttrClient } from "../src/infra/weather/wttrClient.js";
import { jsonResponse, weatherReport } from "./support/fakes.js";

const CURRENT_CONDITION = {
  temp_C: "14",
  FeelsLikeC: "12",
  humidity: "72",
  windspeedKmph: "19",
  windspeedMiles: "12",
  weatherDesc: [{ value: "Partly cloudy " }],
  localObsDateTime: "2024-05-01 09:00 AM",
};

function createClient(fetchImpl: FetchFn, timeoutMs = 1_000) {
  return new WttrClient({
    baseUrl: "https://wttr.test",
    userAgent: "test-agent/1.0",
    timeoutMs,
    fetch: fetchImpl,
  });
}

describe("WttrClient", () => {
  it("requests JSON conditions and maps the current observation", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({ current_condition: [CURRENT_CONDITION] }),
    );

    const report = await createClient(fetchMock).lookup("new york");

    expect(report).toEqual(weatherReport({ place: "New York" }));
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://wttr.test/new%20york?format=j1");
    expect(init?.headers).toEqual({
      Accept: "application/json",
      "User-Agent": "test-agent/1.0",
    });
  });

  it("maps 404 to NotFoundError", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(new Response("Unknown location", { status: 404 }));

    await expect(createClient(fetchMock).lookup("Atlantis")).rejects.toThrow(
      new NotFoundError("Unknown location: Atlantis."),
    );
  });

  it("maps an unknown-location body to NotFoundError", async () => {
    const fetchMock = vi
      .fn<FetchFn>()
      .mockResolvedValue(new Response("ERROR: Unknown location; please try ~Atlantis", { status: 200 }));

    await expect(createClient(fetchMock).lookup("Atlantis")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("maps a payload without current conditions to NotFoundError", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ current_condition: [] }));

    await expect(createClient(fetchMock).lookup("Nowhere")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("rejects a blank place without calling the service", async () => {
    const fetchMock = vi.fn<FetchFn>();

    await expect(createClient(fetchMock).lookup("  ?  ")).rejects.toBeInstanceOf(NotFoundError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("maps server errors to NetworkError", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(new Response("busy", { status: 503 }));

    await expect(createClient(fetchMock).lookup("London")).rejects.toThrow(
      new NetworkError("Weather service responded with status 503."),
    );
  });

  it("maps a non-JSON body to NetworkError", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(new Response("<html>oops</html>", { status: 200 }));

    await expect(createClient(fetchMock).lookup("London")).rejects.toThrow(
      new NetworkError("Weather service returned a non-JSON response."),
    );
  });

  it("maps malformed fields to NetworkError", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({ current_condition: [{ ...CURRENT_CONDITION, temp_C: "n/a" }] }),
    );

    await expect(createClient(fetchMock).lookup("London")).rejects.toThrow(
      new NetworkError("Weather service returned malformed current conditions."),
    );
  });

  it("maps transport failures to NetworkError", async () => {
    const fetchMock = vi.fn<FetchFn>().mockRejectedValue(new TypeError("fetch failed"));

    await expect(createClient(fetchMock).lookup("London")).rejects.toThrow(
      new NetworkError("Weather request for London failed: fetch failed"),
    );
  });

  it("gives up after the timeout", async () => {
    const hangingFetch: FetchFn = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) {
          return;
        }
        signal.addEventListener("abort", () => reject(signal.reason), { once: true });
      });

    await expect(createClient(hangingFetch, 20).lookup("London")).rejects.toThrow(
      new NetworkError("Weather request for London timed out after 20ms."),
    );
  });
});

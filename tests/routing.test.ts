import { describe, expect, it } from "vitest";
import { createQuery } from "../src/domain/types.js";
import { extractPlace, route } from "../src/pipelines/routing.js";

describe("route", () => {
  it("sends a weather question with a place to the weather handler", () => {
    expect(route(createQuery("What's the weather in London?"))).toEqual({
      route: "weather",
      place: "London",
      signals: { weatherCues: ["weather"], documentCues: [], place: "London" },
    });
  });

  it("sends document questions to document QA", () => {
    expect(route(createQuery("What services does the healthcare technology company provide?"))).toEqual({
      route: "document_qa",
      reason: "document_cues",
      signals: {
        weatherCues: [],
        documentCues: ["services", "healthcare", "company"],
        place: null,
      },
    });
  });

  it("falls back to document QA when both cue sets fire", () => {
    const decision = route(createQuery("How does the weather affect the company's projects?"));

    expect(decision.route).toBe("document_qa");
    expect(decision.route === "document_qa" ? decision.reason : null).toBe("ambiguous");
    expect(decision.signals.documentCues).toEqual(["company", "projects"]);
  });

  it.each([
    ["What's the weather report for London?", "London", ["weather"]],
    ["Give me the forecast report for Paris", "Paris", ["forecast"]],
    ["Is the weather service reporting rain in Berlin?", "Berlin", ["weather", "rain"]],
  ])("treats %j as a weather question", (text, place, weatherCues) => {
    expect(route(createQuery(text))).toEqual({
      route: "weather",
      place,
      signals: { weatherCues, documentCues: [], place },
    });
  });

  it("still counts report as a document cue on its own", () => {
    const decision = route(createQuery("Summarise the annual report and the weather in Oslo"));

    expect(decision.route === "document_qa" ? decision.reason : null).toBe("ambiguous");
    expect(decision.signals.documentCues).toEqual(["report"]);
  });

  it("falls back to document QA when no cue fires", () => {
    const decision = route(createQuery("Tell me a joke"));
    expect(decision.route === "document_qa" ? decision.reason : null).toBe("no_cues");
  });

  it("does not pick weather without a place", () => {
    const decision = route(createQuery("What is the weather forecast for tomorrow?"));
    expect(decision.route === "document_qa" ? decision.reason : null).toBe("unresolved_place");
  });

  it("uses the configured default place when none is named", () => {
    expect(route(createQuery("Will it rain tomorrow?"), { defaultPlace: "Paris" })).toMatchObject({
      route: "weather",
      place: "Paris",
    });
  });

  it("is a pure function of the query text", () => {
    const query = createQuery("Is it sunny in Lisbon?");
    expect(route(query)).toEqual(route(query));
  });
});

describe("extractPlace", () => {
  it.each([
    ["weather in new york today", "new york"],
    ["What's the temperature in San Francisco right now?", "San Francisco"],
    ["Tokyo forecast for tomorrow", "Tokyo"],
    ["How's the weather at the moment in Paris?", "Paris"],
    ["Is it raining in the Lake District this weekend?", "Lake District"],
  ])("reads %j as %j", (text, expected) => {
    expect(extractPlace(text)).toBe(expected);
  });

  it("returns null when no place is named", () => {
    expect(extractPlace("What's the weather like?")).toBeNull();
  });
});

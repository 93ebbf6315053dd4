import { describe, expect, it } from "vitest";
import { GenerationError } from "../src/domain/errors.js";
import { RetrievalResult, createQuery } from "../src/domain/types.js";
import {
  NO_CONTEXT_ANSWER,
  buildDocumentPrompt,
  formatWeatherReport,
  synthesize,
} from "../src/pipelines/answering.js";
import { RecordingChatModel, weatherReport } from "./support/fakes.js";

const RETRIEVAL: RetrievalResult = [
  {
    chunk: { documentId: "profile.md", index: 0, text: " We build staffing tools. ", start: 0, end: 26 },
    score: 0.91,
  },
  {
    chunk: { documentId: "profile.md", index: 2, text: "Clients are clinics.", start: 160, end: 180 },
    score: 0.42,
  },
];

describe("synthesize", () => {
  it("answers no_context without consulting the model when nothing was retrieved", async () => {
    const chatModel = new RecordingChatModel(async () => "should not be used");

    const answer = await synthesize(createQuery("Who are the clients?"), [], { chatModel });

    expect(answer.status).toBe("no_context");
    expect(answer.text).toBe(NO_CONTEXT_ANSWER);
    expect(chatModel.requests).toHaveLength(0);
  });

  it("grounds the prompt in the retrieved chunks", async () => {
    const chatModel = new RecordingChatModel(async () => "  Clinics are the clients.  ");
    const query = createQuery("Who are the clients?");

    const answer = await synthesize(query, RETRIEVAL, { chatModel });

    expect(answer).toMatchObject({
      provenance: "document_qa",
      status: "ok",
      text: "Clinics are the clients.",
      retrieval: RETRIEVAL,
    });
    expect(chatModel.requests).toHaveLength(1);
    expect(chatModel.requests[0].temperature).toBe(0.2);
    expect(chatModel.requests[0].prompt).toBe(
      "Context:\n[1] (profile.md#0)\nWe build staffing tools.\n\n[2] (profile.md#2)\nClients are clinics.\n\nQuestion: Who are the clients?\n\nAnswer:",
    );
    expect(chatModel.requests[0].system).toContain(
      "Answer the question based only on the provided context.",
    );
  });

  it("wraps model failures in GenerationError", async () => {
    const chatModel = new RecordingChatModel(async () => {
      throw new Error("socket hang up");
    });

    await expect(synthesize(createQuery("Who?"), RETRIEVAL, { chatModel })).rejects.toThrow(
      new GenerationError("Answer generation failed: socket hang up"),
    );
  });

  it("treats a blank completion as a failure", async () => {
    const chatModel = new RecordingChatModel(async () => "   ");

    await expect(synthesize(createQuery("Who?"), RETRIEVAL, { chatModel })).rejects.toThrow(
      new GenerationError("The language model returned an empty answer."),
    );
  });

  it("phrases a weather report through the model", async () => {
    const chatModel = new RecordingChatModel(async () => "Mild and partly cloudy in London.");
    const report = weatherReport();

    const answer = await synthesize(createQuery("Weather in London?"), report, {
      chatModel,
      temperature: 0.5,
    });

    expect(answer).toMatchObject({
      provenance: "weather",
      status: "ok",
      place: "London",
      report,
      text: "Mild and partly cloudy in London.",
    });
    expect(chatModel.requests[0].temperature).toBe(0.5);
    expect(chatModel.requests[0].prompt).toContain("temperature_c: 14");
  });
});

describe("formatWeatherReport", () => {
  it("renders the fixed weather summary", () => {
    expect(formatWeatherReport(weatherReport())).toBe(
      [
        "Weather in London:",
        "- Temperature: 14°C (feels like 12°C)",
        "- Condition: Partly cloudy",
        "- Humidity: 72%",
        "- Wind Speed: 12 mph (19 km/h)",
      ].join("\n"),
    );
  });
});

describe("buildDocumentPrompt", () => {
  it("numbers each chunk with its origin", () => {
    expect(buildDocumentPrompt(createQuery("q"), RETRIEVAL.slice(1))).toBe(
      "Context:\n[1] (profile.md#2)\nClients are clinics.\n\nQuestion: q\n\nAnswer:",
    );
  });
});

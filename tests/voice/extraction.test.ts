import { beforeEach, describe, expect, it, vi } from "vitest";
import { APIConnectionTimeoutError, APIError } from "openai";

const { callExtractionModelMock } = vi.hoisted(() => ({ callExtractionModelMock: vi.fn() }));

vi.mock("@/utils/openai/fieldops", () => ({
  callExtractionModel: (...args: unknown[]) => callExtractionModelMock(...args),
}));

import { DEFAULT_CANDIDATE_CONFIDENCE, extractCandidates } from "@/lib/domain/voice/extraction";

const options = { timeoutMs: 1_000, confidenceThreshold: 0.6, referenceDate: "2025-03-12" };

const respondWith = (payload: Record<string, unknown>) =>
  callExtractionModelMock.mockResolvedValueOnce({ payload, latencyMs: 10, modelName: "gpt-4.1-mini" });

beforeEach(() => {
  callExtractionModelMock.mockReset();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("extractCandidates", () => {
  it("does not call the model for an empty transcript", async () => {
    const result = await extractCandidates("   ", options);

    expect(result).toEqual({ candidates: [], unmatchedText: "", confidence: null, modelName: null });
    expect(callExtractionModelMock).not.toHaveBeenCalled();
  });

  it("maps each record type and drops invalid ones", async () => {
    respondWith({
      records: [
        {
          type: "job_update",
          job_hint: "Sharma",
          fields: { status: "completed", labor_hours: 2 },
          confidence: 0.9,
          field_confidence: { status: 0.95 },
        },
        {
          type: "inventory_adjustment",
          item_hint: "oil filter",
          delta: -3,
          field_confidence: { delta: 0.8, item_hint: 0.7 },
        },
        { type: "followup_create", description: "Check the water heater", due_text: "6 months" },
        { type: "inventory_adjustment", item_hint: "gasket", delta: 0 },
        { type: "invoice_create", amount: 120 },
      ],
      unmatched_text: "  and the weather was nice ",
    });

    const result = await extractCandidates("Finished the Sharma job ...", options);

    expect(callExtractionModelMock).toHaveBeenCalledWith({
      transcript: "Finished the Sharma job ...",
      referenceDate: "2025-03-12",
      signal: expect.any(AbortSignal),
    });
    expect(result.candidates).toEqual([
      {
        type: "job_update",
        confidence: 0.9,
        fieldConfidence: { status: 0.95 },
        needsReview: false,
        ref: { id: null, nameHint: "Sharma" },
        createIfMissing: false,
        fields: { status: "completed", laborHours: 2 },
      },
      {
        type: "inventory_adjustment",
        confidence: 0.7,
        fieldConfidence: { delta: 0.8, item_hint: 0.7 },
        needsReview: false,
        ref: { id: null, nameHint: "oil filter" },
        delta: -3,
        unit: null,
        createIfMissing: false,
      },
      {
        type: "followup_create",
        confidence: DEFAULT_CANDIDATE_CONFIDENCE,
        fieldConfidence: {},
        needsReview: false,
        description: "Check the water heater",
        dueDate: null,
        dueText: "6 months",
        jobRef: null,
        customerName: null,
      },
    ]);
    expect(result.unmatchedText).toBe("and the weather was nice");
    expect(result.confidence).toBeCloseTo((0.9 + 0.7 + 0.85) / 3, 10);
    expect(result.modelName).toBe("gpt-4.1-mini");
  });

  it("marks low-confidence candidates for review", async () => {
    respondWith({
      records: [{ type: "followup_create", description: "Call the customer", job_hint: "Okafor", confidence: 0.4 }],
    });

    const [candidate] = (await extractCandidates("maybe call Okafor", options)).candidates;

    expect(candidate).toMatchObject({
      needsReview: true,
      confidence: 0.4,
      jobRef: { id: null, nameHint: "Okafor" },
    });
  });

  it("returns the whole transcript as unmatched when nothing maps", async () => {
    respondWith({ records: [], unmatched_text: "" });

    const result = await extractCandidates(" The weather was nice today. ", options);

    expect(result).toEqual({
      candidates: [],
      unmatchedText: "The weather was nice today.",
      confidence: null,
      modelName: "gpt-4.1-mini",
    });
  });

  it("fails when the payload has the wrong shape", async () => {
    respondWith({ records: "none" });

    await expect(extractCandidates("used three filters", options)).rejects.toMatchObject({
      code: "ExtractionUnavailable",
      message: "Extraction model returned an unexpected shape",
    });
  });

  it("maps invalid JSON and 5xx responses to ExtractionUnavailable", async () => {
    callExtractionModelMock.mockRejectedValueOnce(new Error("Extraction model returned invalid JSON"));
    await expect(extractCandidates("used three filters", options)).rejects.toMatchObject({
      code: "ExtractionUnavailable",
      status: 503,
      message: "Extraction model unavailable: Extraction model returned invalid JSON",
    });

    callExtractionModelMock.mockRejectedValueOnce(new APIError(500, undefined, "Internal error", undefined));
    await expect(extractCandidates("used three filters", options)).rejects.toMatchObject({
      code: "ExtractionUnavailable",
    });
  });

  it("maps timeouts to ExtractionTimeout", async () => {
    callExtractionModelMock.mockRejectedValueOnce(new APIConnectionTimeoutError());
    await expect(extractCandidates("used three filters", options)).rejects.toMatchObject({
      code: "ExtractionTimeout",
      status: 504,
    });

    callExtractionModelMock.mockImplementationOnce(() => new Promise(() => {}));
    await expect(
      extractCandidates("used three filters", { ...options, timeoutMs: 5 }),
    ).rejects.toMatchObject({ code: "ExtractionTimeout", message: "Extraction exceeded 5ms" });
  });
});

import OpenAI, { toFile } from "openai";

import { describeError } from "@/lib/domain/errors";
import { parseEnvConfig } from "@/schemas/env";

const EXTRACTION_INSTRUCTIONS = [
  "You turn a field technician's spoken work note into structured records for a field-service back office.",
  "Respond with a strict JSON object only (no surrounding prose) with the keys: records (array) and unmatched_text (string).",
  "Each record has a type and one of these shapes:",
  "job_update: { type, job_id?, job_hint? (customer name or short job description the technician used), create_if_missing (true when the note describes new or just-finished work that may not be on file), fields: { status? ('open' | 'in_progress' | 'completed' | 'cancelled'), description?, customer_name?, job_type?, labor_hours?, scheduled_at? (ISO 8601) }, confidence, field_confidence }.",
  "inventory_adjustment: { type, item_id?, item_hint (the material name as spoken, singular), delta (negative integer when parts were used, positive when stock was received), unit?, create_if_missing (only true for newly received stock), confidence, field_confidence }.",
  "followup_create: { type, description, due_date? (YYYY-MM-DD) or due_text? (the spoken relative phrase such as '6 months', 'next week', 'friday'), job_id?, job_hint?, customer_name?, confidence, field_confidence }.",
  "confidence and every field_confidence value are numbers between 0 and 1 describing how sure you are about that value.",
  "Emit one record per distinct fact: 'replaced the pump, used two filters, remind me to call the customer Friday' is one job_update, one inventory_adjustment with delta -2 and one followup_create.",
  "Never invent ids. Use hints exactly as spoken. Put any part of the note you could not map to a record in unmatched_text, verbatim; if nothing maps, return an empty records array and the whole note as unmatched_text.",
].join(" ");

type CallTranscriptionModelOptions = {
  audio: Uint8Array;
  mimeType: string;
  fileName: string;
  signal?: AbortSignal;
};

type CallTranscriptionModelResult = {
  raw: unknown;
  latencyMs: number;
  modelName: string;
};

type CallExtractionModelOptions = {
  transcript: string;
  referenceDate: string;
  signal?: AbortSignal;
};

type CallExtractionModelResult = {
  payload: ModelPayload;
  latencyMs: number;
  modelName: string;
};

type ModelPayload = Record<string, unknown>;

function createModelClient(baseURL: string | null) {
  const config = parseEnvConfig();
  if (!config.openAiApiKey && !baseURL) {
    throw new Error("OPENAI_API_KEY is not configured and no local model endpoint is set.");
  }
  // Local OpenAI-compatible servers (Ollama, faster-whisper) accept any key.
  return new OpenAI({
    apiKey: config.openAiApiKey ?? "local",
    baseURL: baseURL ?? undefined,
    maxRetries: 0,
  });
}

export async function callTranscriptionModel({
  audio,
  mimeType,
  fileName,
  signal,
}: CallTranscriptionModelOptions): Promise<CallTranscriptionModelResult> {
  const config = parseEnvConfig();
  const modelName = config.transcriptionModel;
  const client = createModelClient(config.transcriptionBaseUrl);
  const requestStart = Date.now();

  try {
    const file = await toFile(audio, fileName, { type: mimeType });
    const raw: unknown = await client.audio.transcriptions.create(
      {
        file,
        model: modelName,
        language: "en",
        response_format: "verbose_json",
      },
      { signal },
    );

    const latencyMs = Date.now() - requestStart;
    console.log("[fieldops-transcription-call]", {
      model: modelName,
      audioBytes: audio.byteLength,
      latencyMs,
      success: true,
    });

    return { raw, latencyMs, modelName };
  } catch (error) {
    console.error("[fieldops-transcription-call]", {
      model: modelName,
      audioBytes: audio.byteLength,
      latencyMs: Date.now() - requestStart,
      success: false,
      errorMessage: describeError(error),
    });
    throw error;
  }
}

export async function callExtractionModel({
  transcript,
  referenceDate,
  signal,
}: CallExtractionModelOptions): Promise<CallExtractionModelResult> {
  const config = parseEnvConfig();
  const client = createModelClient(config.extractionBaseUrl);
  const requestStart = Date.now();
  let modelName = config.extractionModel;

  try {
    const completion = await client.chat.completions.create(
      {
        model: config.extractionModel,
        messages: [
          { role: "system", content: EXTRACTION_INSTRUCTIONS },
          {
            role: "user",
            content: `Today is ${referenceDate}.\n\nTechnician note:\n"${transcript}"`,
          },
        ],
        response_format: { type: "json_object" },
        temperature: 0,
      },
      { signal },
    );

    modelName = completion.model ?? modelName;
    const payload = extractModelPayload(completion.choices?.[0]?.message?.content, {
      model: modelName,
    });

    const latencyMs = Date.now() - requestStart;
    console.log("[fieldops-extraction-call]", {
      model: modelName,
      transcriptLength: transcript.length,
      latencyMs,
      success: true,
    });

    return { payload, latencyMs, modelName };
  } catch (error) {
    console.error("[fieldops-extraction-call]", {
      model: modelName,
      transcriptLength: transcript.length,
      latencyMs: Date.now() - requestStart,
      success: false,
      errorMessage: describeError(error),
    });
    throw error;
  }
}

export class ModelOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelOutputError";
  }
}

export function extractModelPayload(rawContent: unknown, meta: { model: string }): ModelPayload {
  const candidates = Array.isArray(rawContent) ? rawContent : [rawContent];

  for (const candidate of candidates) {
    const parsed = parseJsonCandidate(candidate);
    if (parsed) {
      return parsed;
    }
  }

  console.warn("[fieldops-json-parse-error]", {
    model: meta.model,
    rawSnippet: getCandidateSnippet(candidates[0]),
  });
  throw new ModelOutputError("Extraction model returned invalid JSON");
}

function parseJsonCandidate(candidate: unknown): ModelPayload | null {
  if (isPlainObject(candidate)) {
    return candidate;
  }

  if (typeof candidate === "string") {
    try {
      const parsed: unknown = JSON.parse(cleanJsonString(candidate));
      return isPlainObject(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }

  return null;
}

export function cleanJsonString(value: string): string {
  let trimmed = value.trim();

  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenceMatch?.[1]) {
    trimmed = fenceMatch[1].trim();
  }

  const firstBrace = trimmed.indexOf("{");
  const lastBrace = trimmed.lastIndexOf("}");
  if (firstBrace !== -1 && lastBrace > firstBrace) {
    trimmed = trimmed.slice(firstBrace, lastBrace + 1);
  }

  return trimmed;
}

function isPlainObject(value: unknown): value is ModelPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getCandidateSnippet(candidate: unknown): string {
  if (candidate === undefined) {
    return "undefined";
  }
  if (typeof candidate === "string") {
    return cleanJsonString(candidate).slice(0, 200);
  }
  try {
    return JSON.stringify(candidate).replace(/\s+/g, " ").slice(0, 200);
  } catch {
    return String(candidate).slice(0, 200);
  }
}

import { APIConnectionTimeoutError, APIError, APIUserAbortError } from "openai";
import { z } from "zod";

import { FieldOpsError, describeError } from "@/lib/domain/errors";
import { withTimeout } from "@/utils/async/withTimeout";
import { callTranscriptionModel } from "@/utils/openai/fieldops";

import type { TranscriptionResult } from "./types";

export const SUPPORTED_AUDIO_MIME_TYPES = [
  "audio/webm",
  "audio/wav",
  "audio/x-wav",
  "audio/wave",
  "audio/mpeg",
  "audio/mp3",
  "audio/mp4",
  "audio/x-m4a",
  "audio/m4a",
  "audio/ogg",
  "video/webm",
] as const;

const FILE_EXTENSIONS: Record<string, string> = {
  "audio/webm": "webm",
  "video/webm": "webm",
  "audio/wav": "wav",
  "audio/x-wav": "wav",
  "audio/wave": "wav",
  "audio/mpeg": "mp3",
  "audio/mp3": "mp3",
  "audio/mp4": "m4a",
  "audio/x-m4a": "m4a",
  "audio/m4a": "m4a",
  "audio/ogg": "ogg",
};

// Whisper-style models emit these on silence or near-silent recordings.
const SILENCE_HALLUCINATIONS = new Set([
  "thank you",
  "thanks for watching",
  "thanks for listening",
  "thank you for watching",
  "bye",
  "goodbye",
  "see you",
  "you",
  "thanks",
  "the end",
  "subtitles by",
]);

const NO_SPEECH_CUTOFF = 0.9;

export const EMPTY_TRANSCRIPTION: TranscriptionResult = {
  transcript: "",
  confidence: 0,
  durationSeconds: 0,
};

const verboseTranscriptionSchema = z.object({
  text: z.string().nullish(),
  duration: z.number().nullish(),
  segments: z
    .array(
      z.object({
        start: z.number().nullish(),
        end: z.number().nullish(),
        avg_logprob: z.number().nullish(),
        no_speech_prob: z.number().nullish(),
      }),
    )
    .nullish(),
});

type TranscriptionSegment = NonNullable<z.infer<typeof verboseTranscriptionSchema>["segments"]>[number];

export function normalizeMimeType(mimeType: string) {
  return mimeType.split(";")[0].trim().toLowerCase();
}

export function isSupportedMimeType(mimeType: string) {
  const normalized = normalizeMimeType(mimeType);
  return SUPPORTED_AUDIO_MIME_TYPES.some((supported) => supported === normalized);
}

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

const segmentScore = (segment: TranscriptionSegment) =>
  clamp01(Math.exp(segment.avg_logprob ?? 0) * (1 - (segment.no_speech_prob ?? 0)));

/** Duration-weighted mean of exp(avg_logprob) × (1 − no_speech_prob). */
export function scoreSegments(segments: TranscriptionSegment[], transcript: string) {
  if (!segments.length) {
    return transcript ? 1 : 0;
  }

  let weighted = 0;
  let totalWeight = 0;
  for (const segment of segments) {
    const score = segmentScore(segment);
    const weight = Math.max(0, (segment.end ?? 0) - (segment.start ?? 0));
    weighted += score * weight;
    totalWeight += weight;
  }

  if (totalWeight === 0) {
    return segments.reduce((sum, segment) => sum + segmentScore(segment), 0) / segments.length;
  }
  return clamp01(weighted / totalWeight);
}

export function isSilenceHallucination(transcript: string) {
  const normalized = transcript
    .toLowerCase()
    .replace(/[.!?,]/g, "")
    .trim();
  return SILENCE_HALLUCINATIONS.has(normalized);
}

function mapTranscriptionError(error: unknown): FieldOpsError {
  if (error instanceof FieldOpsError) {
    return error;
  }
  if (error instanceof APIConnectionTimeoutError || error instanceof APIUserAbortError) {
    return new FieldOpsError("TranscriptionTimeout", "Transcription service timed out", { cause: error });
  }
  if (error instanceof APIError && error.status === 400 && /format|file|decod|codec|audio/i.test(error.message)) {
    return new FieldOpsError("UnsupportedFormat", `Transcription service rejected the audio: ${describeError(error)}`, {
      cause: error,
    });
  }
  return new FieldOpsError("TranscriptionUnavailable", `Transcription service unavailable: ${describeError(error)}`, {
    cause: error,
  });
}

type TranscribeOptions = {
  timeoutMs: number;
};

export async function transcribeAudio(
  { audio, mimeType }: { audio: Uint8Array; mimeType: string },
  { timeoutMs }: TranscribeOptions,
): Promise<TranscriptionResult> {
  const normalizedMime = normalizeMimeType(mimeType);
  if (!isSupportedMimeType(normalizedMime)) {
    throw new FieldOpsError("UnsupportedFormat", `Unsupported audio format: ${normalizedMime || "unknown"}`);
  }

  if (audio.byteLength === 0) {
    console.warn("[voice-transcription] Empty upload; skipping transcription service");
    return EMPTY_TRANSCRIPTION;
  }

  let raw: unknown;
  try {
    const response = await withTimeout(
      (signal) =>
        callTranscriptionModel({
          audio,
          mimeType: normalizedMime,
          fileName: `recording.${FILE_EXTENSIONS[normalizedMime] ?? "webm"}`,
          signal,
        }),
      timeoutMs,
      () => new FieldOpsError("TranscriptionTimeout", `Transcription exceeded ${timeoutMs}ms`),
    );
    raw = response.raw;
  } catch (error) {
    throw mapTranscriptionError(error);
  }

  const parsed = verboseTranscriptionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FieldOpsError("TranscriptionUnavailable", "Transcription service returned an unexpected response");
  }

  const transcript = parsed.data.text?.trim() ?? "";
  const segments = parsed.data.segments ?? [];
  const lastSegmentEnd = segments.length ? segments[segments.length - 1].end ?? 0 : 0;
  const durationSeconds = parsed.data.duration ?? lastSegmentEnd;

  const allSilent =
    segments.length > 0 && segments.every((segment) => (segment.no_speech_prob ?? 0) >= NO_SPEECH_CUTOFF);
  if (!transcript || allSilent || isSilenceHallucination(transcript)) {
    console.warn("[voice-transcription] Treating transcript as silence", {
      transcript: transcript.slice(0, 80),
      segments: segments.length,
      allSilent,
    });
    return { ...EMPTY_TRANSCRIPTION, durationSeconds };
  }

  const confidence = scoreSegments(segments, transcript);
  console.log("[voice-transcription] Transcribed audio", {
    audioBytes: audio.byteLength,
    durationSeconds,
    confidence: Number(confidence.toFixed(3)),
  });
  return { transcript, confidence, durationSeconds };
}

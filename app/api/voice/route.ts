// Voice intake upload: takes a multipart `file`, runs the intake pipeline and returns the summary.
// Adapter failures still return the summary body, with the status mapped from the error code.
import { NextResponse } from "next/server";
import { z } from "zod";

import { describeError, statusForAdapterError } from "@/lib/domain/errors";
import { createFieldOpsStore } from "@/lib/domain/store/repository";
import { handleVoiceIntake } from "@/lib/domain/voice/intake";
import { logServerError } from "@/utils/errors/logServerError";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const uploadSchema = z.object({
  file: z.instanceof(Blob, { message: 'Missing audio file in form field "file"' }),
});

export async function POST(req: Request) {
  let formData: FormData;
  try {
    formData = await req.formData();
  } catch (error) {
    console.warn("[voice-intake] Could not parse multipart body", { error: describeError(error) });
    return NextResponse.json({ error: "Expected a multipart/form-data body" }, { status: 400 });
  }

  const upload = uploadSchema.safeParse({ file: formData.get("file") });
  if (!upload.success) {
    return NextResponse.json({ error: upload.error.issues[0]?.message ?? "Invalid upload" }, { status: 400 });
  }

  const { file } = upload.data;
  try {
    const audio = new Uint8Array(await file.arrayBuffer());
    const summary = await handleVoiceIntake(createFieldOpsStore(), {
      audio,
      mimeType: file.type || "application/octet-stream",
    });
    const status = summary.error ? statusForAdapterError(summary.error.code) : 200;
    return NextResponse.json(summary, { status });
  } catch (error) {
    logServerError({ entityType: "voice-intake", message: "Voice intake failed" }, error);
    return NextResponse.json({ error: "Voice intake failed" }, { status: 500 });
  }
}

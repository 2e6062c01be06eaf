import { UsageSnapshotSchema, type UsageSnapshot } from "../types.js";

export type ParseResult =
  | { ok: true; snapshot: UsageSnapshot }
  | { ok: false; message: string };

function preview(body: string): string {
  const oneLine = body.replace(/\s+/g, " ").trim();
  return oneLine.length > 120 ? `${oneLine.slice(0, 119)}…` : oneLine;
}

// Parses the body of a successful usage response. Dimensions the service
// leaves out (or sends as null) stay null; extra keys are ignored.
export function parseUsageResponse(body: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return { ok: false, message: `response is not JSON: ${preview(body)}` };
  }

  if (json === null || typeof json !== "object" || Array.isArray(json)) {
    return { ok: false, message: `unexpected response shape: ${preview(body)}` };
  }

  const parsed = UsageSnapshotSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") || "(root)" : "(root)";
    return {
      ok: false,
      message: `unexpected response shape at ${where}: ${issue?.message ?? "invalid"}`,
    };
  }

  return { ok: true, snapshot: parsed.data };
}

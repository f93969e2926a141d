import { z } from "zod";
import { ModelError } from "../errors.js";

const urgencySchema = z.enum(["low", "normal", "high"]);

export const analysisResultSchema = z.object({
  summary: z.string().min(1),
  keyPoints: z.array(z.string()).default([]),
  senderIntent: z.string().min(1),
  tone: z.string().default("neutral"),
  urgency: z.preprocess(normalizeUrgency, urgencySchema),
});

// Models often answer "Medium" or "HIGH"; map those onto the enum.
function normalizeUrgency(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const lowered = value.trim().toLowerCase();
  return lowered === "medium" ? "normal" : lowered;
}

export type AnalysisResult = z.infer<typeof analysisResultSchema>;

/**
 * Pull the outermost JSON object out of model text, tolerating code fences
 * and prose around it.
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}

/**
 * Parse the analysis agent's output into an AnalysisResult.
 * Output that is not the requested JSON shape is a ModelError.
 */
export function parseAnalysis(text: string): AnalysisResult {
  const json = extractJsonObject(text);
  if (json === null) {
    throw new ModelError("Analysis output contained no JSON object.");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ModelError("Analysis output was not valid JSON.", { cause: error });
  }

  const parsed = analysisResultSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new ModelError(`Analysis output is missing or has invalid fields: ${fields}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

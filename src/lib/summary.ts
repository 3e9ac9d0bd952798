import { z } from "zod";
import { CapabilityError } from "./errors.js";
import type { Summary } from "../capabilities/types.js";

export const SummarySchema = z.object({
  title: z.string().trim().min(1),
  description: z.string().trim().min(1),
});

const FENCED_JSON = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/;

/**
 * Parse a model reply into a Summary. Replies wrapped in a Markdown code fence
 * are unwrapped first. Anything else that is not the expected JSON object is a
 * parse failure.
 */
export function parseSummary(reply: string): Summary {
  let body = reply.trim();
  const fenced = body.match(FENCED_JSON);
  if (fenced) body = fenced[1];

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    throw new CapabilityError(`Summary is not valid JSON: ${body.slice(0, 80)}`, "parse", {
      cause: error,
    });
  }

  return validateSummary(raw);
}

export function validateSummary(raw: unknown): Summary {
  const parsed = SummarySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CapabilityError(
      `Summary is missing ${issue?.path.join(".") || "fields"}: ${issue?.message ?? "invalid"}`,
      "parse"
    );
  }
  return parsed.data;
}

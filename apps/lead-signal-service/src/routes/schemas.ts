import { z } from "zod";
import { config } from "../config";

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

export const leadInputSchema = z.object({
  role: z.string(),
  company_size: z.string(),
  message: z.string(),
});

export const batchInputSchema = z.object({
  leads: z.array(leadInputSchema)
    .min(1, "At least one lead is required")
    .max(config.batchMaxLeads, `At most ${config.batchMaxLeads} leads per batch`),
});

const optionalText = z.string().nullish().catch(null);

/**
 * Scored lead echoed back by the dashboard. Spreadsheet exports send the score
 * as text, so it is coerced; anything unusable counts as 0.
 */
export const chatLeadSchema = z.object({
  full_name: optionalText,
  email: optionalText,
  company_name: optionalText,
  role: optionalText,
  score: z.coerce.number().finite().catch(0),
  priority_label: optionalText,
  justification: optionalText,
});

export const chatQuerySchema = z.object({
  query: z.string().trim().min(1, "Query is required"),
  leads_data: z.array(chatLeadSchema),
});

export const chatSuggestionsSchema = z.array(chatLeadSchema);

/**
 * Flatten zod issues into one readable line per field
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join(".") || "body"}: ${issue.message}`);
}

import { TextGenerator } from "./llm";
import { RateLimitError } from "../errors";
import { HIGH_PRIORITY_THRESHOLD, MEDIUM_PRIORITY_THRESHOLD } from "./priority";

// ============================================================================
// TYPES
// ============================================================================

/**
 * A previously scored lead as the dashboard sends it back for questions.
 * Contact fields are optional; score is always numeric after validation.
 */
export interface ChatLeadRecord {
  full_name?: string | null;
  email?: string | null;
  company_name?: string | null;
  role?: string | null;
  score: number;
  priority_label?: string | null;
  justification?: string | null;
}

export interface ChatAnswer {
  answer: string;
  success: boolean;
  error: string | null;
  leads_analyzed: number;
}

/**
 * Free-form questions about a set of scored leads. Lives outside the scoring
 * engine and is injected into the HTTP layer only.
 */
export interface LeadQuestionAnswerer {
  answerQuestion(query: string, leads: readonly ChatLeadRecord[]): Promise<ChatAnswer>;
}

const TOP_LEADS_IN_PROMPT = 10;
const BOTTOM_LEADS_IN_PROMPT = 5;

const LEAD_KEYWORDS = [
  "lead", "score", "priority", "contact", "call", "email",
  "company", "companies", "customer", "prospect", "sales",
  "top", "best", "highest", "lowest", "budget", "urgent",
  "who", "which", "what", "show", "list", "tell me about",
  "recommend", "prioritize", "focus", "crm", "deal",
];

const NO_DATA_ANSWER = "No lead data available yet. Please process some leads first!";
const CASUAL_FALLBACK_ANSWER = "I'm doing well, thank you! Is there anything about your leads I can help you with?";
const RATE_LIMIT_ANSWER =
  "The text generation service is rate limiting requests right now. Please wait a moment and try again.";

// ============================================================================
// AGENT
// ============================================================================

export function createLeadChatAgent(generator: TextGenerator): LeadQuestionAnswerer {
  return {
    async answerQuestion(query, leads) {
      if (!isLeadRelatedQuestion(query)) {
        return answerCasually(generator, query);
      }

      if (leads.length === 0) {
        return { answer: NO_DATA_ANSWER, success: true, error: null, leads_analyzed: 0 };
      }

      try {
        const rawAnswer = (await generator.complete(buildChatPrompt(query, leads), {
          temperature: 0.7,
          maxTokens: 500,
        })).trim();

        // Second call only when the first answer came back structured
        let answer = rawAnswer;
        if (needsConversion(rawAnswer)) {
          console.log(`[chat] Structured answer, requesting conversational rewrite`);
          answer = (await generator.complete(buildRewritePrompt(rawAnswer), {
            temperature: 0.7,
            maxTokens: 500,
          })).trim();
        }

        return {
          answer: normalizeAnswer(answer),
          success: true,
          error: null,
          leads_analyzed: leads.length,
        };
      } catch (error) {
        if (error instanceof RateLimitError) {
          console.error(`[chat] Rate limited:`, error.message);
          return {
            answer: RATE_LIMIT_ANSWER,
            success: false,
            error: "Rate limit exceeded (429)",
            leads_analyzed: leads.length,
          };
        }

        const message = error instanceof Error ? error.message : "Unknown error";
        console.error(`[chat] Error:`, message);
        return {
          answer: `Sorry, I encountered an error: ${message}`,
          success: false,
          error: message,
          leads_analyzed: leads.length,
        };
      }
    },
  };
}

async function answerCasually(generator: TextGenerator, query: string): Promise<ChatAnswer> {
  const prompt = [
    "You are a friendly assistant for a sales team.",
    "The user asked something that is not about their leads.",
    "",
    `USER QUESTION: ${query}`,
    "",
    "Reply in one or two friendly sentences, then mention you can help with their lead data.",
  ].join("\n");

  try {
    const answer = (await generator.complete(prompt, { temperature: 0.9, maxTokens: 150 })).trim();
    return { answer: answer || CASUAL_FALLBACK_ANSWER, success: true, error: null, leads_analyzed: 0 };
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    console.error(`[chat] Casual reply failed, using fallback:`, message);
    return { answer: CASUAL_FALLBACK_ANSWER, success: true, error: null, leads_analyzed: 0 };
  }
}

// ============================================================================
// PROMPTS
// ============================================================================

export function isLeadRelatedQuestion(query: string): boolean {
  const queryLower = query.toLowerCase();
  return LEAD_KEYWORDS.some(k => queryLower.includes(k));
}

export function countByPriority(leads: readonly ChatLeadRecord[]): { high: number; medium: number; low: number } {
  return {
    high: leads.filter(l => l.score >= HIGH_PRIORITY_THRESHOLD).length,
    medium: leads.filter(l => l.score >= MEDIUM_PRIORITY_THRESHOLD && l.score < HIGH_PRIORITY_THRESHOLD).length,
    low: leads.filter(l => l.score > 0 && l.score < MEDIUM_PRIORITY_THRESHOLD).length,
  };
}

/**
 * Prompt carrying the portfolio summary, the top leads and (for larger sets)
 * the bottom leads, followed by the user's question.
 */
export function buildChatPrompt(query: string, leads: readonly ChatLeadRecord[]): string {
  const counts = countByPriority(leads);
  const sorted = [...leads].sort((a, b) => b.score - a.score);
  const top = sorted.slice(0, TOP_LEADS_IN_PROMPT);
  const bottom = sorted.length > TOP_LEADS_IN_PROMPT ? sorted.slice(-BOTTOM_LEADS_IN_PROMPT) : [];

  const topLines = top.map((lead, idx) => {
    const line = `${idx + 1}. ${describeLead(lead)}`;
    const why = displayValue(lead.justification);
    return why === "N/A" ? line : `${line}\n   Why: ${why}`;
  });
  const bottomLines = bottom.map((lead, idx) => `${idx + 1}. ${describeLead(lead)}`);

  return [
    "You are a helpful sales assistant answering a question about the team's leads.",
    "",
    `CONTEXT - ${leads.length} leads analyzed:`,
    `- ${counts.high} High Priority leads (scores 80-100)`,
    `- ${counts.medium} Medium Priority leads (scores 40-79)`,
    `- ${counts.low} Low Priority leads (scores 1-39)`,
    "",
    `TOP ${TOP_LEADS_IN_PROMPT} HIGHEST-SCORING LEADS:`,
    ...topLines,
    "",
    `LOWEST-SCORING ${BOTTOM_LEADS_IN_PROMPT} LEADS:`,
    ...(bottomLines.length > 0 ? bottomLines : ["(none beyond the top list)"]),
    "",
    `QUESTION: ${query}`,
    "",
    "Answer in a short conversational paragraph of full sentences.",
    "Mention names, titles, companies and emails inside the sentences.",
    "Do not use JSON, bullet points, numbered lists or comma-separated quoted values.",
  ].join("\n");
}

function buildRewritePrompt(structured: string): string {
  return [
    "Rewrite the following as natural, conversational text for a colleague.",
    "No JSON, brackets, quotes or comma-separated values; only full sentences.",
    "",
    structured,
  ].join("\n");
}

function describeLead(lead: ChatLeadRecord): string {
  return [
    `${displayValue(lead.full_name, "Unknown")} from ${displayValue(lead.company_name)}`,
    displayValue(lead.role),
    `Score: ${Math.trunc(lead.score)}/100`,
    `Email: ${displayValue(lead.email)}`,
  ].join(" - ");
}

const MISSING_MARKERS = ["", "nan", "none", "null", "undefined", "nat", "inf", "-inf"];

export function displayValue(value: string | null | undefined, fallback = "N/A"): string {
  if (value === null || value === undefined) return fallback;
  const trimmed = value.trim();
  return MISSING_MARKERS.includes(trimmed.toLowerCase()) ? fallback : trimmed;
}

// ============================================================================
// ANSWER POST-PROCESSING
// ============================================================================

const QUOTED_TRIPLE = /"[^"]+"\s*,\s*"[^"]+"\s*,\s*"[^"]+"/;
const QUOTED_PAIR = /"[^"]+"\s*,\s*"[^"]+"/;
const JSON_FIELD_NAMES = ['"summary":', '"response":', '"answer":', '"message":'];
const TEXT_FIELDS = ["summary", "response", "answer", "message"];

/**
 * True when an answer looks like data (JSON object, quoted value list, JSON
 * field names) rather than prose.
 */
export function needsConversion(answer: string): boolean {
  if (answer.startsWith("{") && answer.endsWith("}")) return true;
  if (QUOTED_TRIPLE.test(answer)) return true;
  const lower = answer.toLowerCase();
  return JSON_FIELD_NAMES.some(name => lower.includes(name));
}

export function normalizeAnswer(raw: string): string {
  let answer = raw.trim();

  if (answer.startsWith("{") && answer.endsWith("}")) {
    answer = extractTextField(answer) ?? answer;
  }

  if (QUOTED_PAIR.test(answer)) {
    const values = Array.from(answer.matchAll(/"([^"]+)"/g), m => m[1]);
    if (values.length >= 3) {
      answer = `Lead information: ${values.join(" | ")}`;
    }
  }

  return answer.replace(/^"+|"+$/g, "").replace(/^'+|'+$/g, "");
}

function extractTextField(json: string): string | null {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    return null;
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) return null;

  for (const key of TEXT_FIELDS) {
    const value: unknown = Reflect.get(data, key);
    if (typeof value === "string") return value;
  }
  return null;
}

// ============================================================================
// SUGGESTIONS
// ============================================================================

export function getSuggestedQuestions(leads: readonly ChatLeadRecord[]): string[] {
  if (leads.length === 0) {
    return ["How do I get started?", "What can you help me with?"];
  }

  const suggestions = [
    "Who are the top 5 leads I should contact?",
    "Show me all high priority leads",
    "What patterns do you see in high-scoring leads?",
    "Which companies have urgent needs?",
    "Who has budget approval?",
    "What industries are represented in top leads?",
    "Compare high vs medium priority leads",
    "Give me contact details for top 3 leads",
  ];

  const { high } = countByPriority(leads);
  if (high > 0) {
    suggestions.unshift(`Tell me about the ${high} high priority leads`);
  }

  return suggestions.slice(0, 8);
}

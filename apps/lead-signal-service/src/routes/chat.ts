import { Router, Request, Response } from "express";
import { LeadQuestionAnswerer, getSuggestedQuestions } from "../services/chat";
import { chatQuerySchema, chatSuggestionsSchema, formatIssues } from "./schemas";

/**
 * POST /chat, /chat/suggestions
 * `answerer` is null when no text-generation service is configured.
 */
export function createChatRouter(answerer: LeadQuestionAnswerer | null): Router {
  const router = Router();

  router.post("/", async (req: Request, res: Response) => {
    if (!answerer) {
      return res.status(503).json({
        error: "Chat is not available. Set OPENAI_API_KEY to enable it."
      });
    }

    const parsed = chatQuerySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid chat query", details: formatIssues(parsed.error) });
    }

    try {
      const { query, leads_data } = parsed.data;
      const result = await answerer.answerQuestion(query, leads_data);

      console.log(`[chat] Answered:`, {
        tenant: req.tenant?.name,
        leads_analyzed: result.leads_analyzed,
        success: result.success,
      });

      return res.status(200).json({ ...result, timestamp: new Date().toISOString() });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error(`[chat] Error:`, message);
      return res.status(500).json({ error: `Error processing chat query: ${message}` });
    }
  });

  router.post("/suggestions", (req: Request, res: Response) => {
    const parsed = chatSuggestionsSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        suggestions: [],
        success: false,
        error: formatIssues(parsed.error).join("; "),
      });
    }

    return res.status(200).json({ suggestions: getSuggestedQuestions(parsed.data), success: true });
  });

  return router;
}

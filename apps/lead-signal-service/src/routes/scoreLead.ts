import express, { Router, Request, Response } from "express";
import { PatternCatalog } from "../catalog/patternCatalog";
import { scoreLeadForResponse, scoreBatch } from "../services/batch";
import { scoreLeadCsv } from "../services/csv";
import { InvalidInputError } from "../errors";
import { config } from "../config";
import { leadInputSchema, batchInputSchema, formatIssues } from "./schemas";

/**
 * POST /score, /score/batch, /score/csv
 * The catalog is loaded once at start and shared by every request.
 */
export function createScoreRouter(catalog: PatternCatalog): Router {
  const router = Router();

  router.post("/", (req: Request, res: Response) => {
    const parsed = leadInputSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid lead", details: formatIssues(parsed.error) });
    }

    const result = scoreLeadForResponse(parsed.data, catalog);

    console.log(`[score] Scored lead:`, {
      tenant: req.tenant?.name,
      score: result.score,
      priority: result.priority_label,
    });

    return res.status(200).json(result);
  });

  router.post("/batch", (req: Request, res: Response) => {
    const parsed = batchInputSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid batch", details: formatIssues(parsed.error) });
    }

    const startTime = Date.now();
    const batch = scoreBatch(parsed.data.leads, catalog);

    console.log(`[score] Batch scored:`, {
      tenant: req.tenant?.name,
      total: batch.total,
      successful: batch.successful,
      failed: batch.failed,
      duration_ms: Date.now() - startTime,
    });

    return res.status(200).json(batch);
  });

  router.post(
    "/csv",
    express.text({ type: ["text/csv", "text/plain"], limit: config.bodyLimit }),
    (req: Request, res: Response) => {
      const body: unknown = req.body;
      if (typeof body !== "string" || body.trim() === "") {
        return res.status(400).json({ error: "Expected a non-empty text/csv body" });
      }

      try {
        const { csv, total, failed } = scoreLeadCsv(body, catalog);

        console.log(`[score] CSV scored:`, { tenant: req.tenant?.name, total, failed });

        const stamp = new Date().toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
        res.setHeader("Content-Type", "text/csv; charset=utf-8");
        res.setHeader("Content-Disposition", `attachment; filename="scored_leads_${stamp}.csv"`);
        return res.status(200).send(csv);
      } catch (error) {
        if (error instanceof InvalidInputError) {
          return res.status(400).json({ error: error.message });
        }
        const message = error instanceof Error ? error.message : "Unknown error";
        console.error(`[score] CSV error:`, message);
        return res.status(500).json({ error: message });
      }
    }
  );

  return router;
}

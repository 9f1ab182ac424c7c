import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import {
  runSiteAudit,
  auditPage,
  auditPages,
  PageAttributesSchema,
  SiteReportSchema,
  type SiteAuditServices,
} from "./audit";
import { summarizeRanks } from "./audit/rank-checker";
import { extractKeywords } from "./audit/keywords";
import { analyticsStore, type IAnalyticsStore } from "./analytics";
import { generateCsv, generateMarkdown } from "./report";
import { createAuditServices } from "./services";
import { getConfig } from "./config";

const AuditRequestSchema = z.object({
  url: z.string().url(),
  maxPages: z.coerce.number().int().positive().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  userAgent: z.string().optional(),
  keywords: z.array(z.string().trim().min(1)).optional(),
  ai: z.boolean().optional(),
});

const PagesRequestSchema = z.object({
  pages: z.array(PageAttributesSchema),
});

const RankRequestSchema = z.object({
  domain: z.string().min(1),
  keywords: z.array(z.string().trim().min(1)).min(1),
  country: z.string().optional(),
  language: z.string().optional(),
});

const KeywordsRequestSchema = z.object({
  text: z.string(),
  limit: z.coerce.number().int().positive().max(100).optional(),
  method: z.enum(["frequency", "phrases", "both"]).optional(),
});

const ShowcaseQuerySchema = z.object({
  page: z.coerce.number().int().catch(1).transform((n) => Math.max(1, n)),
  limit: z.coerce.number().int().catch(10).transform((n) => Math.min(50, Math.max(1, n))),
  sortBy: z.enum(["createdAt", "score"]).catch("createdAt"),
  sortDir: z.enum(["asc", "desc"]).catch("desc"),
});

export interface RouteOptions {
  store?: IAnalyticsStore;
  services?: SiteAuditServices;
  runAudit?: typeof runSiteAudit;
}

function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error && error.message ? error.message : fallback;
}

function sendInvalid(res: Response, error: z.ZodError, message = "Invalid request body"): void {
  res.status(400).json({ error: true, message, details: error.errors });
}

export async function registerRoutes(httpServer: Server, app: Express, options: RouteOptions = {}): Promise<Server> {
  const store = options.store ?? analyticsStore;
  const runAudit = options.runAudit ?? runSiteAudit;

  let services = options.services;
  const getServices = (): SiteAuditServices => {
    services ??= createAuditServices(getConfig());
    return services;
  };

  app.post("/api/audit", async (req: Request, res: Response) => {
    try {
      const parsed = AuditRequestSchema.safeParse(req.body);

      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }

      const report = await runAudit(parsed.data, getServices());
      const entry = await store.recordReport(report);

      res.json({ ...report, reportId: entry.id });
    } catch (error) {
      const message = errorMessage(error, "An error occurred during the audit");
      const statusCode = message.includes("SSRF") ? 403 : 500;

      res.status(statusCode).json({ error: true, message });
    }
  });

  app.post("/api/audit/pages", (req: Request, res: Response) => {
    const parsed = PagesRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalid(res, parsed.error);
      return;
    }
    res.json(auditPages(parsed.data.pages));
  });

  app.post("/api/audit/page", (req: Request, res: Response) => {
    const parsed = PageAttributesSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalid(res, parsed.error);
      return;
    }
    res.json(auditPage(parsed.data));
  });

  app.post("/api/rank", async (req: Request, res: Response) => {
    try {
      const parsed = RankRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }

      const { domain, keywords, country, language } = parsed.data;
      const results = await getServices().rankChecker.checkKeywords(domain, keywords, { country, language });
      res.json({ results, summary: summarizeRanks(results) });
    } catch (error) {
      res.status(500).json({ error: true, message: errorMessage(error, "Failed to check rankings") });
    }
  });

  app.post("/api/keywords", (req: Request, res: Response) => {
    const parsed = KeywordsRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalid(res, parsed.error);
      return;
    }
    const { text, limit, method } = parsed.data;
    res.json({ keywords: extractKeywords(text, limit, method) });
  });

  const exportFormats = [
    { path: "/api/export/markdown", contentType: "text/markdown", prefix: "seo-report", extension: "md", render: generateMarkdown },
    { path: "/api/export/csv", contentType: "text/csv", prefix: "seo-pages", extension: "csv", render: generateCsv },
  ];

  for (const format of exportFormats) {
    app.post(format.path, (req: Request, res: Response) => {
      try {
        const parsed = SiteReportSchema.safeParse(req.body);
        if (!parsed.success) {
          sendInvalid(res, parsed.error, "Invalid audit report data");
          return;
        }

        const body = format.render(parsed.data);
        const date = new Date().toISOString().split("T")[0];

        res.setHeader("Content-Type", format.contentType);
        res.setHeader("Content-Disposition", `attachment; filename="${format.prefix}-${date}.${format.extension}"`);
        res.send(body);
      } catch (error) {
        res.status(500).json({ error: true, message: errorMessage(error, "Failed to generate export") });
      }
    });
  }

  app.get("/api/analytics", async (_req: Request, res: Response) => {
    try {
      res.json(await store.getSummary());
    } catch (error) {
      res.status(500).json({ error: true, message: errorMessage(error, "Failed to fetch analytics") });
    }
  });

  app.get("/api/analytics/all", async (req: Request, res: Response) => {
    try {
      const { sortBy, sortDir } = ShowcaseQuerySchema.parse(req.query);
      res.json(await store.getAll(sortBy, sortDir));
    } catch (error) {
      res.status(500).json({ error: true, message: errorMessage(error, "Failed to fetch analytics") });
    }
  });

  app.get("/api/showcase", async (req: Request, res: Response) => {
    try {
      res.json(await store.getShowcase(ShowcaseQuerySchema.parse(req.query)));
    } catch (error) {
      res.status(500).json({ error: true, message: errorMessage(error, "Failed to fetch showcase") });
    }
  });

  app.get("/api/reports/:id", async (req: Request, res: Response) => {
    try {
      const report = await store.getReportById(req.params.id);
      if (!report) {
        res.status(404).json({ error: true, message: "Report not found" });
        return;
      }
      res.json(report);
    } catch (error) {
      res.status(500).json({ error: true, message: errorMessage(error, "Failed to fetch report") });
    }
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", service: "site-seo-audit" });
  });

  return httpServer;
}

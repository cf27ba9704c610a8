import express, { type Express } from "express";
import cors from "cors";
import morgan from "morgan";
import path from "node:path";
import { z } from "zod";
import type { RunSummary } from "../pipeline";
import { errorMessage } from "../utils";

export const ResearchBodySchema = z.object({
  query: z.string().trim().min(1, "query is required").max(500),
  delayMs: z.number().int().min(0).max(60_000).optional(),
  limit: z.number().int().positive().max(100).optional(),
  topN: z.number().int().positive().max(50).optional(),
});

export type ResearchRequest = z.infer<typeof ResearchBodySchema>;

export type RunResearch = (request: ResearchRequest) => Promise<RunSummary>;

export type AppOptions = {
  run: RunResearch;
  outputDir: string;
  logRequests?: boolean;
};

export type FileLink = {
  kind: string;
  name: string;
  path: string;
  downloadUrl: string | null;
};

export function describeFile(kind: string, filePath: string, filesRoot: string): FileLink {
  const absolute = path.resolve(filePath);
  const name = path.basename(absolute);
  return {
    kind,
    name,
    path: absolute,
    downloadUrl: path.dirname(absolute) === filesRoot ? `/files/${encodeURIComponent(name)}` : null,
  };
}

export function createApp({ run, outputDir, logRequests = true }: AppOptions): Express {
  const filesRoot = path.resolve(outputDir);
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  if (logRequests) app.use(morgan("dev"));

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "web-research", outputDir: filesRoot });
  });

  app.use(
    "/files",
    express.static(filesRoot, {
      setHeaders: (res) => {
        res.setHeader("Cache-Control", "no-store");
      },
    })
  );

  app.post("/api/research", async (req, res) => {
    const parsed = ResearchBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: parsed.error.flatten() });
      return;
    }

    try {
      const summary = await run(parsed.data);
      if (summary.status === "no-results") {
        res.json({ ok: true, status: "no-results", query: summary.query });
        return;
      }

      res.json({
        ok: true,
        status: "completed",
        meta: {
          query: summary.query,
          totalLinks: summary.totalLinks,
          successfulExtractions: summary.successfulExtractions,
          failedExtractions: summary.failedExtractions,
          totalContentLength: summary.totalContentLength,
          avgContentLength: summary.avgContentLength,
          domainStats: summary.domainStats,
        },
        files: Object.entries(summary.files).map(([kind, p]) => describeFile(kind, p, filesRoot)),
      });
    } catch (err) {
      res.status(500).json({ ok: false, error: errorMessage(err) || "research failed" });
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  return app;
}

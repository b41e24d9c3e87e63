// src/api-routes.ts
import { Router, Request, Response, NextFunction } from "express";
import type {
  ApiResponse,
  RankingResponse,
  ResolveResponse,
  StandingsSnapshot,
} from "@champions-pool/shared";
import {
  aggregate,
  canonicalNames,
  clampThreshold,
  pointsByTeam,
  rankPositions,
  resolveTeam,
  type SimilarityScorer,
} from "@champions-pool/pool-engine";
import type { PoolConfig } from "./config.js";
import type { StandingsCache } from "./standings-cache.js";

export interface ApiDependencies {
  cache: StandingsCache;
  pool: PoolConfig;
  scorer: SimilarityScorer;
  matchThreshold: number;
}

// Helper function to send API responses
const sendResponse = <T>(res: Response, status: number, data?: T, error?: string, message?: string) => {
  const response: ApiResponse<T> = {
    success: !error,
    data,
    error,
    message,
  };
  res.status(status).json(response);
};

/** Undefined when absent, null when present but not an integer in 0..100. */
function parseThreshold(value: unknown): number | null | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string" || !/^\d+$/.test(value)) return null;
  const threshold = Number.parseInt(value, 10);
  return threshold <= 100 ? threshold : null;
}

export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();

  // Middleware to set common headers
  router.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    next();
  });

  /**
   * Checks for a 'refreshCache' query parameter. If 'true', triggers a cache refresh
   * before the route handler runs.
   */
  router.use(async (req: Request, res: Response, next: NextFunction) => {
    if (req.query.refreshCache === "true") {
      console.log("Server: Manual cache refresh requested via query parameter.");
      const success = await deps.cache.refresh();
      if (!success) {
        return sendResponse(res, 500, undefined, "Failed to refresh standings cache.");
      }
    }
    next();
  });

  const withSnapshot = async (res: Response): Promise<StandingsSnapshot | null> => {
    const snapshot = await deps.cache.get();
    if (!snapshot) {
      sendResponse(res, 503, undefined, "Standings are not available yet.");
    }
    return snapshot;
  };

  // GET /api/standings - Current standings table
  router.get("/standings", async (req: Request, res: Response) => {
    try {
      const snapshot = await withSnapshot(res);
      if (snapshot) sendResponse(res, 200, snapshot);
    } catch (error) {
      console.error("Server: Error serving /standings:", error);
      sendResponse(res, 500, undefined, error instanceof Error ? error.message : "Unknown error");
    }
  });

  // GET /api/ranking?threshold=60 - Pool ranking
  router.get("/ranking", async (req: Request, res: Response) => {
    const requested = parseThreshold(req.query.threshold);
    if (requested === null) {
      return sendResponse(res, 400, undefined, "threshold must be an integer between 0 and 100");
    }
    const threshold = clampThreshold(requested ?? deps.matchThreshold);

    try {
      const snapshot = await withSnapshot(res);
      if (!snapshot) return;

      const ranking = rankPositions(
        aggregate(snapshot.table, deps.pool.participants, deps.pool.aliases, threshold, deps.scorer),
      );
      const body: RankingResponse = {
        source: snapshot.source,
        fallback: snapshot.fallback,
        fetchedAt: snapshot.fetchedAt,
        threshold,
        ranking,
      };
      sendResponse(res, 200, body);
    } catch (error) {
      console.error("Server: Error serving /ranking:", error);
      sendResponse(res, 500, undefined, error instanceof Error ? error.message : "Unknown error");
    }
  });

  // GET /api/resolve?q=Inter&threshold=60 - Resolve one team label
  router.get("/resolve", async (req: Request, res: Response) => {
    const { q } = req.query;
    if (typeof q !== "string" || !q.trim()) {
      return sendResponse(res, 400, undefined, "Query parameter 'q' is required");
    }
    const requested = parseThreshold(req.query.threshold);
    if (requested === null) {
      return sendResponse(res, 400, undefined, "threshold must be an integer between 0 and 100");
    }
    const threshold = clampThreshold(requested ?? deps.matchThreshold);

    try {
      const snapshot = await withSnapshot(res);
      if (!snapshot) return;

      const { bestCandidate, score } = resolveTeam(
        q,
        canonicalNames(snapshot.table),
        deps.pool.aliases,
        threshold,
        deps.scorer,
      );
      const body: ResolveResponse = {
        query: q,
        bestCandidate,
        score,
        points: bestCandidate === null ? 0 : (pointsByTeam(snapshot.table).get(bestCandidate) ?? 0),
      };
      sendResponse(res, 200, body);
    } catch (error) {
      console.error("Server: Error serving /resolve:", error);
      sendResponse(res, 500, undefined, error instanceof Error ? error.message : "Unknown error");
    }
  });

  // GET /api/participants - Configured pool
  router.get("/participants", (req: Request, res: Response) => {
    sendResponse(res, 200, deps.pool);
  });

  return router;
}

// src/standings-cache.ts
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { StandingsSnapshot } from "@champions-pool/shared";
import { buildStandingsTable } from "@champions-pool/pool-engine";

const CACHE_FILE_NAME = "standings.json";
const DEFAULT_STALE_AFTER_MS = 1000 * 60 * 60; // 1 hour for in-memory staleness

const snapshotSchema = z.object({
  table: z.array(
    z.object({
      canonicalName: z.string(),
      points: z.number(),
      tiebreakFields: z.array(z.number()),
    }),
  ),
  source: z.enum(["api", "html", "static"]),
  fallback: z.boolean(),
  fetchedAt: z.string(),
});

export interface StandingsCacheOptions {
  /** Produces a fresh snapshot; usually `loadStandings` bound to the configured sources. */
  load: () => Promise<StandingsSnapshot>;
  cacheDir: string;
  refreshIntervalMs: number;
  staleAfterMs?: number;
  now?: () => number;
}

interface CacheEntry {
  snapshot: StandingsSnapshot;
  loadedAt: number;
}

export class StandingsCache {
  private entry: CacheEntry | null = null;
  private refreshTimeout: NodeJS.Timeout | null = null;
  private isRefreshing = false; // Flag to prevent concurrent refreshes
  private stopped = false;
  private readonly cacheFile: string;
  private readonly now: () => number;

  constructor(private readonly options: StandingsCacheOptions) {
    this.cacheFile = path.join(options.cacheDir, CACHE_FILE_NAME);
    this.now = options.now ?? Date.now;
  }

  get filePath(): string {
    return this.cacheFile;
  }

  private async ensureCacheDir(): Promise<void> {
    await fs.mkdir(this.options.cacheDir, { recursive: true });
  }

  private async readCache(): Promise<StandingsSnapshot | null> {
    let data: string;
    try {
      data = await fs.readFile(this.cacheFile, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        // File not found, which is fine for initial run
        return null;
      }
      console.error(`Cache: Error reading cache file ${this.cacheFile}:`, error);
      return null;
    }

    try {
      const parsed = snapshotSchema.safeParse(JSON.parse(data));
      if (!parsed.success) {
        console.warn(`Cache: Ignoring cache file ${this.cacheFile} with unexpected contents.`);
        return null;
      }
      // Re-sort and freeze through the builder so a hand-edited file still honours table order.
      const table = buildStandingsTable(
        parsed.data.table.map((row) => ({
          name: row.canonicalName,
          points: row.points,
          tiebreakFields: row.tiebreakFields,
        })),
      );
      return { ...parsed.data, table };
    } catch (error) {
      console.error(`Cache: Error parsing cache file ${this.cacheFile}:`, error);
      return null;
    }
  }

  private async writeCache(snapshot: StandingsSnapshot): Promise<void> {
    try {
      await fs.writeFile(this.cacheFile, JSON.stringify(snapshot, null, 2), "utf8");
    } catch (error) {
      console.error(`Cache: Error writing cache file ${this.cacheFile}:`, error);
    }
  }

  /**
   * Loads a fresh snapshot and stores it. A fallback snapshot never replaces
   * real standings already held, and is not persisted.
   * @returns True if the cache now holds the new snapshot.
   */
  async refresh(): Promise<boolean> {
    if (this.isRefreshing) {
      console.log("Cache: Refresh already in progress. Skipping.");
      return false;
    }

    this.isRefreshing = true;
    console.log("Cache: Starting refresh...");
    try {
      await this.ensureCacheDir();
      const snapshot = await this.options.load();

      if (snapshot.fallback && this.entry && !this.entry.snapshot.fallback) {
        console.warn("Cache: Source unavailable; keeping previously fetched standings.");
        this.entry = { ...this.entry, loadedAt: this.now() };
        return false;
      }

      this.entry = { snapshot, loadedAt: this.now() };
      if (!snapshot.fallback) {
        await this.writeCache(snapshot);
      }
      console.log(`Cache: Refresh completed (${snapshot.table.length} rows from ${snapshot.source}).`);
      return true;
    } catch (error) {
      console.error("Cache: Failed to refresh:", error);
      return false;
    } finally {
      this.isRefreshing = false;
    }
  }

  /**
   * Loads the cache file if present, otherwise performs an initial refresh,
   * then schedules the background refresh.
   */
  async initialize(): Promise<void> {
    await this.ensureCacheDir();

    const cached = await this.readCache();
    if (cached && cached.table.length > 0) {
      this.entry = { snapshot: cached, loadedAt: this.now() };
      console.log(`Cache: Loaded ${cached.table.length} rows from ${this.cacheFile}.`);
    } else {
      console.log("Cache: No existing cache found or cache is empty. Performing initial refresh...");
      await this.refresh();
    }

    this.scheduleRefresh();
  }

  private scheduleRefresh(): void {
    if (this.stopped) return;
    if (this.refreshTimeout) {
      clearTimeout(this.refreshTimeout);
    }

    console.log(`Cache: Scheduling next refresh in ${Math.round(this.options.refreshIntervalMs / 1000 / 60)} minutes.`);
    this.refreshTimeout = setTimeout(() => {
      void this.refresh().finally(() => this.scheduleRefresh());
    }, this.options.refreshIntervalMs);
  }

  /**
   * Current snapshot. A stale in-memory snapshot triggers a refresh first;
   * if that fails the stale data is still served.
   */
  async get(): Promise<StandingsSnapshot | null> {
    const staleAfterMs = this.options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
    if (!this.entry || this.now() - this.entry.loadedAt > staleAfterMs) {
      console.log("Cache: In-memory standings are stale or empty. Refreshing...");
      await this.refresh();
    }
    return this.entry ? this.entry.snapshot : null;
  }

  stop(): void {
    this.stopped = true;
    if (this.refreshTimeout) {
      clearTimeout(this.refreshTimeout);
      this.refreshTimeout = null;
    }
  }
}

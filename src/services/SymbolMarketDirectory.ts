import { promises as fs } from "node:fs";
import { z } from "zod";
import type { Market } from "../types";
import { describeError } from "../utils/errors";
import logger from "../utils/logger";

const marketSchema = z.enum(["KOSPI", "KOSDAQ"]);

export const symbolCodeSchema = z.string().regex(/^[0-9A-Z]{6}$/, "Expected a six character symbol code");

export const symbolMarketFileSchema = z.record(symbolCodeSchema, marketSchema);

/**
 * Maps listed symbols to the market whose trade channel carries them.
 * Unknown symbols resolve to the configured default market.
 */
export class SymbolMarketDirectory {
  private readonly markets = new Map<string, Market>();
  private loadingPromise: Promise<void> | null = null;

  constructor(
    private readonly defaultMarket: Market,
    entries: Record<string, Market> = {},
  ) {
    this.setAll(entries);
  }

  /**
   * Load symbol → market pairs from a JSON file. A missing file leaves the directory as is.
   */
  async loadFromFile(filePath: string): Promise<void> {
    if (this.loadingPromise) {
      await this.loadingPromise;
      return;
    }

    this.loadingPromise = this.readFile(filePath);
    try {
      await this.loadingPromise;
    } finally {
      this.loadingPromise = null;
    }
  }

  resolve(symbol: string): Market {
    return this.markets.get(symbol) ?? this.defaultMarket;
  }

  set(symbol: string, market: Market): void {
    this.markets.set(symbol, market);
  }

  get size(): number {
    return this.markets.size;
  }

  private setAll(entries: Record<string, Market>): void {
    for (const [symbol, market] of Object.entries(entries)) {
      this.markets.set(symbol, market);
    }
  }

  private async readFile(filePath: string): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        logger.warn({ path: filePath, defaultMarket: this.defaultMarket }, "Symbol market file not found, using default market");
        return;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Symbol market file ${filePath} is not valid JSON: ${describeError(error)}`);
    }

    const result = symbolMarketFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Symbol market file ${filePath} is invalid: ${result.error.issues[0]?.message ?? "unknown issue"}`);
    }

    this.setAll(result.data);
    logger.info({ path: filePath, symbols: this.markets.size }, "Symbol market directory loaded");
  }
}

export default SymbolMarketDirectory;

import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import type { MarketTick } from "@tickbench/types";
import { MalformedInputError } from "@tickbench/core";

const REQUIRED_COLUMNS = ["price", "symbol", "timestamp"] as const;

const OFFSET_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parses an ISO 8601 timestamp. A date-time without an offset is read as UTC.
 */
export function parseTimestamp(value: string): Date | null {
  let text = value.trim();
  if (/^\d{4}-\d{2}-\d{2} \d/.test(text)) {
    text = text.replace(" ", "T");
  }
  if (text.includes("T") && !OFFSET_SUFFIX.test(text)) {
    text = `${text}Z`;
  }

  const date = new Date(text);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function parsePrice(value: string): number | null {
  const text = value.trim();
  if (text.length === 0) {
    return null;
  }
  const price = Number(text);
  return Number.isFinite(price) ? price : null;
}

/** Parses `timestamp,symbol,price` CSV text; extra columns are ignored. */
export function parseMarketDataCsv(content: string, source: string = "CSV"): MarketTick[] {
  const lines = content.split(/\r?\n/);
  const header = (lines[0] ?? "").split(",").map((cell) => cell.trim());

  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new Error(
      `${source} must have columns ${REQUIRED_COLUMNS.join(", ")}; got ${header.filter(Boolean).join(", ") || "none"}`
    );
  }

  const timestampIndex = header.indexOf("timestamp");
  const symbolIndex = header.indexOf("symbol");
  const priceIndex = header.indexOf("price");

  const ticks: MarketTick[] = [];
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim().length === 0) {
      continue;
    }

    const cells = line.split(",");
    const lineNumber = i + 1;

    const timestamp = parseTimestamp(cells[timestampIndex] ?? "");
    if (!timestamp) {
      throw new MalformedInputError(
        `${source} line ${lineNumber}: invalid timestamp "${cells[timestampIndex] ?? ""}"`
      );
    }

    const price = parsePrice(cells[priceIndex] ?? "");
    if (price === null) {
      throw new MalformedInputError(`${source} line ${lineNumber}: invalid price "${cells[priceIndex] ?? ""}"`);
    }

    ticks.push({ timestamp, symbol: (cells[symbolIndex] ?? "").trim(), price });
  }

  return ticks;
}

export function loadMarketData(csvPath: string): MarketTick[] {
  const path = resolve(csvPath);
  if (!existsSync(path)) {
    throw new Error(`CSV not found: ${path}`);
  }

  return parseMarketDataCsv(readFileSync(path, "utf-8"), csvPath);
}

export function extractPrices(ticks: readonly MarketTick[]): number[] {
  return ticks.map((tick) => tick.price);
}

export function describeDatasetFootprint(count: number): string {
  return [
    `Storing ${count.toLocaleString("en-US")} ticks in an array is O(N) space.`,
    "- The array holds N references (O(N)).",
    "- Each tick holds a constant number of fields (O(1) per tick), plus its symbol string.",
    "Overall: O(N) total space."
  ].join("\n");
}

import { log } from "./log";
import type { Coordinate } from "@shared/types";

export interface SkippedLine {
  lineNumber: number;
  text: string;
}

export interface ParseResult {
  coordinates: Coordinate[];
  skipped: SkippedLine[];
}

// Plain decimal literals only: no hex, no Infinity/NaN words
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseNumber(token: string): number | null {
  if (!DECIMAL.test(token)) return null;
  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a theta-rho file into coordinates in file order.
 *
 * Blank lines and `#` comments are ignored. Any other line must hold exactly
 * two numbers separated by whitespace; lines that don't are logged and
 * skipped. Never throws.
 */
export function parseThetaRho(source: string | Iterable<string>): ParseResult {
  const lines = typeof source === "string" ? source.split(/\r?\n/) : source;
  const coordinates: Coordinate[] = [];
  const skipped: SkippedLine[] = [];

  let lineNumber = 0;
  for (const raw of lines) {
    lineNumber++;
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const tokens = line.split(/\s+/);
    const theta = tokens.length === 2 ? parseNumber(tokens[0]) : null;
    const rho = tokens.length === 2 ? parseNumber(tokens[1]) : null;

    if (theta === null || rho === null) {
      log(`Skipping invalid line ${lineNumber}: ${line}`, "parser");
      skipped.push({ lineNumber, text: line });
      continue;
    }

    coordinates.push({ theta, rho });
  }

  return { coordinates, skipped };
}

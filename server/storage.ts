import { mkdir, readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { log } from "./log";
import { PatternNotFoundError } from "./errors";

export interface IPatternStorage {
  listPatterns(): Promise<string[]>;
  /** Raw lines of the pattern file; rejects with PatternNotFoundError. */
  readPatternLines(name: string): Promise<string[]>;
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

// A pattern name is a bare file name inside the pattern directory
export function isValidPatternName(name: string): boolean {
  return (
    name.length > 0 &&
    name !== "." &&
    name !== ".." &&
    !name.includes("/") &&
    !name.includes("\\") &&
    !name.includes("\0")
  );
}

export class FilePatternStorage implements IPatternStorage {
  constructor(private readonly directory: string) {}

  async listPatterns(): Promise<string[]> {
    await mkdir(this.directory, { recursive: true });
    const entries = await readdir(this.directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  }

  async readPatternLines(name: string): Promise<string[]> {
    if (!isValidPatternName(name)) {
      log(`Refusing pattern name: ${name}`, "storage");
      throw new PatternNotFoundError(name);
    }

    try {
      const text = await readFile(path.join(this.directory, name), "utf8");
      return splitLines(text);
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new PatternNotFoundError(name);
      }
      throw error;
    }
  }
}

function isMissingFileError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "EISDIR" || error.code === "ENOTDIR";
}

export class MemPatternStorage implements IPatternStorage {
  private readonly patterns: Map<string, string>;

  constructor(initial: Record<string, string> = {}) {
    this.patterns = new Map(Object.entries(initial));
  }

  async listPatterns(): Promise<string[]> {
    return Array.from(this.patterns.keys()).sort();
  }

  async readPatternLines(name: string): Promise<string[]> {
    const text = this.patterns.get(name);
    if (text === undefined) {
      throw new PatternNotFoundError(name);
    }
    return splitLines(text);
  }
}

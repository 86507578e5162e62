import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { errorMessage } from "../errors.js";
import type { GeneratedExample, Logger } from "../types/index.js";

export const MAX_HISTORY_ENTRIES = 50;
export const MAX_STORED_SUMMARY_CHARS = 1000;

const exampleSchema = z.object({
  timestamp: z.string(),
  commitsSummary: z.string(),
  generatedPost: z.string(),
  metrics: z.object({
    inputLength: z.number(),
    outputLength: z.number(),
    wordCount: z.number(),
    timestamp: z.string(),
  }),
});

const historySchema = z.array(exampleSchema);

/**
 * Bounded, oldest-first log of generated posts, kept as a JSON array.
 *
 * Each append rewrites the whole file. Two runs appending at the same time
 * can lose an entry; runs are expected to be serialized by the scheduler.
 */
export class PostHistory {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
    private readonly maxEntries: number = MAX_HISTORY_ENTRIES
  ) {}

  async load(): Promise<GeneratedExample[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      this.logger.warn(`Could not read post history ${this.filePath}: ${errorMessage(error)}`);
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`Post history ${this.filePath} is not valid JSON: ${errorMessage(error)}`);
      return [];
    }

    const parsed = historySchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(`Post history ${this.filePath} has an unexpected shape, ignoring it`);
      return [];
    }
    return parsed.data;
  }

  /**
   * Appends an example and returns the number of entries kept. A failed write
   * is logged, not thrown, so the count is returned either way.
   */
  async append(example: GeneratedExample): Promise<number> {
    const entries = [...(await this.load()), example].slice(-this.maxEntries);

    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      const tempPath = `${this.filePath}.${process.pid}.tmp`;
      await writeFile(tempPath, `${JSON.stringify(entries, null, 2)}\n`, "utf-8");
      await rename(tempPath, this.filePath);
      this.logger.info(`Saved post example (total: ${entries.length})`);
    } catch (error) {
      this.logger.error(`Error saving post example: ${errorMessage(error)}`);
    }

    return entries.length;
  }
}

export function buildExample(commitsSummary: string, generatedPost: string, now: Date = new Date()): GeneratedExample {
  const timestamp = now.toISOString();
  return {
    timestamp,
    commitsSummary: commitsSummary.slice(0, MAX_STORED_SUMMARY_CHARS),
    generatedPost,
    metrics: {
      inputLength: commitsSummary.length,
      outputLength: generatedPost.length,
      wordCount: countWords(generatedPost),
      timestamp,
    },
  };
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

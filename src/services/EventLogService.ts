/**
 * EventLogService — append-only event log
 *
 * One JSON object per line, Zod-validated on the way in and on the way
 * out. Appends from concurrent agents are serialized so lines land in
 * the order they were issued.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { StackEventSchema } from "../types/index.js";
import type { StackEvent } from "../types/index.js";
import { StackValidationError, StackWriteError } from "../errors/index.js";

/** Minimal interface consumed by the run coordinator. */
export interface EventLogLike {
  append(event: StackEvent): Promise<void>;
}

/** Event log that discards everything. */
export const NULL_EVENT_LOG: EventLogLike = {
  append: async () => {},
};

/**
 * Parse JSON-lines content into events. Blank lines are ignored;
 * malformed or invalid lines are reported through `onInvalid` and skipped
 * rather than blocking every read.
 */
export function parseEventLines(
  content: string,
  onInvalid: (lineNumber: number, reason: string) => void = () => {},
): StackEvent[] {
  const events: StackEvent[] = [];
  content.split("\n").forEach((line, i) => {
    if (line.trim() === "") return;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (err) {
      onInvalid(i + 1, err instanceof Error ? err.message : String(err));
      return;
    }

    const result = StackEventSchema.safeParse(json);
    if (result.success) {
      events.push(result.data);
    } else {
      onInvalid(i + 1, result.error.issues.map((issue) => issue.message).join("; "));
    }
  });
  return events;
}

/**
 * FileEventLog
 *
 * Appends events to a JSON-lines file, creating the parent directory on
 * first write.
 */
export class FileEventLog implements EventLogLike {
  public readonly filePath: string;

  /** Tail of the write chain; every append waits for the previous one. */
  private tail: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * @throws StackValidationError — event fails the schema
   * @throws StackWriteError      — I/O failure
   */
  append(event: StackEvent): Promise<void> {
    const result = StackEventSchema.safeParse(event);
    if (!result.success) {
      return Promise.reject(StackValidationError.fromZodError(this.filePath, result.error));
    }

    const line = JSON.stringify(result.data) + "\n";
    const write = this.tail.then(async () => {
      try {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.appendFile(this.filePath, line, "utf-8");
      } catch (err) {
        throw new StackWriteError(this.filePath, err);
      }
    });

    // The caller receives the failure; the chain itself keeps going.
    this.tail = write.catch(() => undefined);
    return write;
  }

  /** Read every valid event. Returns [] when the log does not exist yet. */
  async readAll(): Promise<StackEvent[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (
        typeof err === "object" &&
        err !== null &&
        "code" in err &&
        err.code === "ENOENT"
      ) {
        return [];
      }
      throw err;
    }

    return parseEventLines(content, (lineNumber, reason) => {
      console.warn(
        `FileEventLog: skipping invalid line ${lineNumber} of ${this.filePath}: ${reason}`,
      );
    });
  }
}

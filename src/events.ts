import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { ensureDir, readTextIfExists } from "./utils/fs.js";
import { silentLogger, type Logger } from "./utils/log.js";

export const EVENTS_FILE_NAME = "events.jsonl";

/** Every event kind, with the fields it carries. */
export interface EventFields {
  stage_created: { id: string; files_copied: number };
  stage_reset: { id?: string };
  apply_started: { source: string; dry_run: boolean };
  apply_succeeded: { files_written: number; files_deleted: number; promoted: boolean };
  apply_rejected: { reason: string };
  file_written: { path: string };
  file_deleted: { path: string };
  check_started: { command: string };
  check_passed: { command: string };
  check_failed: { command: string; exit_code: number };
  promote_started: { files: number };
  promote_succeeded: { files_written: number; files_deleted: number; backup: string };
  promote_failed: { error: string; rolled_back: boolean };
  sanitization_performed: { path: string; lines_removed: number };
}

export type EventTag = keyof EventFields;

const EventRecordSchema = z.object({
  timestamp: z.number(),
  kind: z.object({ tag: z.string(), fields: z.record(z.unknown()) })
});

export type StoredEvent = z.infer<typeof EventRecordSchema>;

/**
 * Append-only JSON-lines audit trail. The file is opened per append; failures
 * are reported to the logger and never thrown.
 */
export class EventLog {
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(stateDir: string, logger: Logger = silentLogger) {
    this.filePath = path.join(stateDir, EVENTS_FILE_NAME);
    this.logger = logger;
  }

  async append<T extends EventTag>(tag: T, fields: EventFields[T]): Promise<void> {
    // timestamp is unix seconds
    const record = { timestamp: Math.floor(Date.now() / 1000), kind: { tag, fields } };
    try {
      await ensureDir(path.dirname(this.filePath));
      await fs.appendFile(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
    } catch (err) {
      this.logger.debug(`event log append failed (${tag}): ${errorMessage(err)}`);
    }
  }
}

/** Reads the log back, skipping lines that do not parse. */
export async function readEvents(filePath: string): Promise<StoredEvent[]> {
  const raw = await readTextIfExists(filePath);
  if (raw === null) {
    return [];
  }
  const events: StoredEvent[] = [];
  for (const line of raw.split("\n")) {
    if (line.trim() === "") {
      continue;
    }
    try {
      const parsed = EventRecordSchema.safeParse(JSON.parse(line));
      if (parsed.success) {
        events.push(parsed.data);
      }
    } catch {
      continue;
    }
  }
  return events;
}

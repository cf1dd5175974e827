/**
 * Journal capabilities: one markdown file per local day under the journal
 * directory, entries appended as `## title (HH:MM:SS)` sections.
 */

import { Type } from "@sinclair/typebox";
import { appendFile, mkdir, readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import type { Capability } from "../core/registry.js";
import { localDate, localTime } from "./time.js";

export interface JournalOptions {
  journalDir: string;
  now?: () => Date;
}

const WriteJournalParams = Type.Object({
  content: Type.String({ minLength: 1, description: "Journal entry content" }),
  title: Type.Optional(Type.String({ description: "Optional title for the entry" })),
});

const ReadJournalParams = Type.Object({
  date: Type.Optional(
    Type.String({ pattern: "^\\d{4}-\\d{2}-\\d{2}$", description: "Specific date (YYYY-MM-DD)" })
  ),
  days_back: Type.Integer({ minimum: 1, maximum: 365, default: 1, description: "Days to read back when no date is given" }),
});

/**
 * Format one journal entry.
 */
export function formatJournalEntry(content: string, time: string, title?: string): string {
  const heading = title ? `## ${title} (${time})` : `## ${time}`;
  return [heading, "", content, "", "---", ""].join("\n");
}

function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word !== "").length;
}

export function createJournalCapabilities(options: JournalOptions): {
  write: Capability<typeof WriteJournalParams>;
  read: Capability<typeof ReadJournalParams>;
} {
  const now = options.now ?? (() => new Date());
  const fileFor = (date: string): string => join(options.journalDir, `${date}.md`);

  return {
    write: {
      name: "write_journal",
      description: "Write an entry to your personal journal. Use for reflections, thoughts, or important moments.",
      parameters: WriteJournalParams,
      returns: "status, file path, word count and time of the entry",
      category: "journal",
      execute: async ({ content, title }) => {
        const at = now();
        const time = localTime(at);
        const file = fileFor(localDate(at));
        await mkdir(options.journalDir, { recursive: true });
        await appendFile(file, formatJournalEntry(content, time, title), "utf8");
        return { status: "saved", file, length: countWords(content), timestamp: time };
      },
    },
    read: {
      name: "read_journal",
      description: "Read your journal entries from a specific date or the last few days.",
      parameters: ReadJournalParams,
      returns: "entries (file contents), dates and count",
      category: "journal",
      execute: async ({ date, days_back }) => {
        const dates: string[] = [];
        if (date !== undefined) {
          dates.push(date);
        } else {
          const today = now();
          for (let i = 0; i < days_back; i++) {
            const day = new Date(today.getFullYear(), today.getMonth(), today.getDate() - i);
            dates.push(localDate(day));
          }
        }

        const entries: string[] = [];
        const found: string[] = [];
        for (const day of dates) {
          const file = fileFor(day);
          if (existsSync(file)) {
            entries.push(await readFile(file, "utf8"));
            found.push(day);
          }
        }
        return { entries, dates: found, count: entries.length };
      },
    },
  };
}

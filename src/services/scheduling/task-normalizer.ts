/**
 * Task Normalizer
 * Turns loosely-shaped task input into typed Task records.
 * Malformed field values fall back to documented defaults instead of failing.
 */

import { z } from "zod";
import { format, isValid, parseISO, startOfDay } from "date-fns";
import { logger } from "../../utils/logger";
import type { PriorityTier, Task } from "./types";

export const DEFAULT_TITLE = "Untitled Task";
export const DEFAULT_ESTIMATED_TIME = 30;
export const DEFAULT_PRIORITY: PriorityTier = "medium";

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const NUMERIC_TIERS: Record<string, PriorityTier> = {
  "1": "high",
  "2": "medium",
  "3": "low",
};

/**
 * Parse a deadline into a local calendar date.
 * Accepts `YYYY-MM-DD` strings and Date values; anything else is treated as no deadline.
 */
export function parseDeadline(value: unknown): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? startOfDay(value) : null;
  }

  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  if (!ISO_DATE_PATTERN.test(trimmed)) {
    return null;
  }

  const parsed = parseISO(trimmed);
  return isValid(parsed) ? parsed : null;
}

function toPriorityTier(value: unknown): unknown {
  if (typeof value === "number") {
    return NUMERIC_TIERS[String(value)];
  }
  if (typeof value === "string") {
    const key = value.trim().toLowerCase();
    return NUMERIC_TIERS[key] ?? key;
  }
  return value;
}

function toNumber(value: unknown): unknown {
  if (typeof value === "string" && value.trim() !== "") {
    return Number(value);
  }
  return value;
}

const taskSchema = z.object({
  id: z.union([z.string(), z.number().finite()]).optional().catch(undefined),
  title: z.string().trim().min(1).catch(DEFAULT_TITLE),
  estimated_time: z
    .preprocess(toNumber, z.number().finite().positive())
    .transform((minutes) => Math.max(1, Math.round(minutes)))
    .catch(DEFAULT_ESTIMATED_TIME),
  priority: z.preprocess(toPriorityTier, z.enum(["high", "medium", "low"])).catch(DEFAULT_PRIORITY),
  deadline: z.unknown().transform((value) => {
    const date = parseDeadline(value);
    return date ? format(date, "yyyy-MM-dd") : null;
  }),
  completed: z.unknown().transform((value) => value === true || value === "true" || value === 1),
});

export function normalizeTask(raw: unknown): Task | null {
  const parsed = taskSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export interface NormalizedTasks {
  tasks: Task[];
  rejected: boolean;
  skipped: number;
}

/**
 * Normalize a task list. A non-array input is rejected as a whole;
 * individual entries that are not objects are skipped.
 */
export function normalizeTasks(raw: unknown): NormalizedTasks {
  if (!Array.isArray(raw)) {
    logger.warn("Rejected task input: expected an array", { receivedType: typeof raw });
    return { tasks: [], rejected: true, skipped: 0 };
  }

  const tasks: Task[] = [];
  let skipped = 0;

  for (const entry of raw) {
    const task = normalizeTask(entry);
    if (task) {
      tasks.push(task);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    logger.debug("Skipped non-object task entries", { skipped, accepted: tasks.length });
  }

  return { tasks, rejected: false, skipped };
}

/**
 * Normalize a time budget in minutes. Returns null for negative or non-numeric input.
 */
export function normalizeBudget(raw: unknown): number | null {
  const value = toNumber(raw);
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    logger.warn("Rejected time budget", { budget: String(raw) });
    return null;
  }
  return Math.floor(value);
}

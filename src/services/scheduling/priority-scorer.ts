/**
 * Priority Scorer
 * Combines priority tier, deadline urgency and duration into one orderable score.
 * Higher scores are scheduled first.
 *
 * Tier gaps (40+) exceed the largest urgency boost (20), and urgency gaps (5)
 * exceed the largest duration bonus (< 1), so tier dominates urgency and
 * urgency dominates duration.
 */

import { differenceInCalendarDays } from "date-fns";
import { parseDeadline } from "./task-normalizer";
import type { PriorityTier, Task } from "./types";

export type UrgencyTier =
  | "overdue"
  | "today"
  | "soon" // Due within 3 days
  | "week" // Due within 7 days
  | "none"; // No deadline, unparseable, or later

export const TIER_BASE_SCORES: Record<PriorityTier, number> = {
  high: 100,
  medium: 50,
  low: 10,
};

export const URGENCY_BOOSTS: Record<UrgencyTier, number> = {
  overdue: 20,
  today: 15,
  soon: 10,
  week: 5,
  none: 0,
};

const DURATION_HORIZON_MINUTES = 480;

export interface ScoreBreakdown {
  base: number;
  urgency: number;
  duration: number;
  total: number;
  urgency_tier: UrgencyTier;
  days_until_deadline: number | null;
}

export function getDaysUntilDeadline(deadline: unknown, today: Date = new Date()): number | null {
  const date = parseDeadline(deadline);
  if (!date) {
    return null;
  }
  return differenceInCalendarDays(date, today);
}

export function getUrgencyTier(deadline: unknown, today: Date = new Date()): UrgencyTier {
  const days = getDaysUntilDeadline(deadline, today);

  if (days === null) return "none";
  if (days < 0) return "overdue";
  if (days === 0) return "today";
  if (days <= 3) return "soon";
  if (days <= 7) return "week";
  return "none";
}

function durationBonus(estimatedMinutes: number): number {
  return 1 - Math.min(estimatedMinutes, DURATION_HORIZON_MINUTES) / DURATION_HORIZON_MINUTES;
}

export function explainScore(task: Task, today: Date = new Date()): ScoreBreakdown {
  const urgencyTier = getUrgencyTier(task.deadline, today);
  const base = TIER_BASE_SCORES[task.priority];
  const urgency = URGENCY_BOOSTS[urgencyTier];
  const duration = durationBonus(task.estimated_time);

  return {
    base,
    urgency,
    duration,
    total: base + urgency + duration,
    urgency_tier: urgencyTier,
    days_until_deadline: getDaysUntilDeadline(task.deadline, today),
  };
}

export function scoreTask(task: Task, today: Date = new Date()): number {
  return explainScore(task, today).total;
}

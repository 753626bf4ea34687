/**
 * Schedule Analyzer
 * Efficiency and quality diagnostics for a produced schedule. Read-only; never feeds back into allocation.
 */

import { PRIORITY_TIERS } from "./types";
import type { PriorityTier, QualityRating, ScheduledTask, ScheduleDiagnostics } from "./types";

export type AnalyzableTask = Pick<
  ScheduledTask,
  "priority" | "allocated_time" | "completion_percentage" | "partial"
>;

export const PRIORITY_WEIGHTS: Record<PriorityTier, number> = {
  high: 3,
  medium: 2,
  low: 1,
};

const SHORT_ALLOCATION_MAX = 30;
const LONG_ALLOCATION_MIN = 90;

const QUALITY_POINTS = {
  allTiers: 30,
  mixedLengths: 30,
  completion: 40,
};

const RATING_THRESHOLDS: Array<{ below: number; rating: QualityRating }> = [
  { below: 40, rating: "poor" },
  { below: 60, rating: "fair" },
  { below: 80, rating: "good" },
];

function roundOne(value: number): number {
  return Math.round(value * 10) / 10;
}

export function rateQuality(score: number): QualityRating {
  for (const threshold of RATING_THRESHOLDS) {
    if (score < threshold.below) {
      return threshold.rating;
    }
  }
  return "excellent";
}

export function calculateQualityScore(schedule: readonly AnalyzableTask[]): number {
  if (schedule.length === 0) {
    return 0;
  }

  const tiers = new Set(schedule.map((task) => task.priority));
  const hasAllTiers = PRIORITY_TIERS.every((tier) => tiers.has(tier));

  const hasShort = schedule.some((task) => task.allocated_time <= SHORT_ALLOCATION_MAX);
  const hasLong = schedule.some((task) => task.allocated_time > LONG_ALLOCATION_MIN);

  const averageCompletion =
    schedule.reduce((sum, task) => sum + Math.min(100, Math.max(0, task.completion_percentage)), 0) /
    schedule.length;

  const score =
    (hasAllTiers ? QUALITY_POINTS.allTiers : 0) +
    (hasShort && hasLong ? QUALITY_POINTS.mixedLengths : 0) +
    (averageCompletion / 100) * QUALITY_POINTS.completion;

  return roundOne(score);
}

export function analyzeSchedule(
  schedule: readonly AnalyzableTask[],
  budget: number,
): ScheduleDiagnostics {
  const totalAllocated = schedule.reduce((sum, task) => sum + task.allocated_time, 0);
  const weighted = schedule.reduce(
    (sum, task) => sum + task.allocated_time * PRIORITY_WEIGHTS[task.priority],
    0,
  );
  const hasBudget = Number.isFinite(budget) && budget > 0;

  const qualityScore = calculateQualityScore(schedule);

  return {
    // Truncated: 100 only when the whole budget is allocated
    time_utilization: hasBudget ? Math.floor((totalAllocated * 1000) / budget) / 10 : 0,
    priority_weighted_score: hasBudget ? roundOne((weighted / (budget * 3)) * 100) : 0,
    quality_rating: rateQuality(qualityScore),
    quality_score: qualityScore,
    total_allocated_time: totalAllocated,
    scheduled_count: schedule.length,
    partial_count: schedule.filter((task) => task.partial).length,
  };
}

/**
 * Completion Estimator
 * Forecasts how long the active backlog takes and summarizes completed work.
 */

import { z } from "zod";
import { addDays, format } from "date-fns";
import { normalizeTask, normalizeTasks } from "./task-normalizer";
import type { PriorityTier, Task } from "./types";

export const DEFAULT_EFFICIENCY_FACTOR = 0.8;
export const DEFAULT_DAILY_CAPACITY = 360; // 6 productive hours

export interface CompletionEstimate {
  total_time: number;
  adjusted_time: number;
  days_needed: number;
  estimated_completion: string | null;
  priority_breakdown: Record<PriorityTier, number>;
  daily_capacity: number;
  efficiency_factor: number;
}

export interface CompletionStats {
  total_completed: number;
  total_time_spent: number;
  avg_completion_time: number;
  completed_by_priority: Record<PriorityTier, number>;
  productivity_score: number;
}

export interface EstimateOptions {
  efficiencyFactor?: number;
  dailyCapacity?: number;
  today?: Date;
}

const actualTimeSchema = z.object({
  actual_time: z.coerce.number().finite().positive().optional().catch(undefined),
});

function roundOne(value: number): number {
  return Math.round(value * 10) / 10;
}

function emptyBreakdown(): Record<PriorityTier, number> {
  return { high: 0, medium: 0, low: 0 };
}

export function estimateCompletion(rawTasks: unknown, options: EstimateOptions = {}): CompletionEstimate {
  const efficiency =
    options.efficiencyFactor !== undefined && options.efficiencyFactor > 0 && options.efficiencyFactor <= 1
      ? options.efficiencyFactor
      : DEFAULT_EFFICIENCY_FACTOR;
  const capacity =
    options.dailyCapacity !== undefined && options.dailyCapacity > 0
      ? options.dailyCapacity
      : DEFAULT_DAILY_CAPACITY;

  const active = normalizeTasks(rawTasks).tasks.filter((task) => !task.completed);
  const breakdown = emptyBreakdown();

  if (active.length === 0) {
    return {
      total_time: 0,
      adjusted_time: 0,
      days_needed: 0,
      estimated_completion: null,
      priority_breakdown: breakdown,
      daily_capacity: capacity,
      efficiency_factor: efficiency,
    };
  }

  for (const task of active) {
    breakdown[task.priority] += task.estimated_time;
  }

  const totalTime = active.reduce((sum, task) => sum + task.estimated_time, 0);
  const adjustedTime = totalTime / efficiency;
  const daysNeeded = adjustedTime / capacity;
  const completionDate = addDays(options.today ?? new Date(), Math.floor(daysNeeded) + 1);

  return {
    total_time: totalTime,
    adjusted_time: Math.round(adjustedTime),
    days_needed: roundOne(daysNeeded),
    estimated_completion: format(completionDate, "yyyy-MM-dd"),
    priority_breakdown: breakdown,
    daily_capacity: capacity,
    efficiency_factor: efficiency,
  };
}

export function calculateCompletionStats(rawTasks: unknown): CompletionStats {
  const entries = Array.isArray(rawTasks) ? rawTasks : [];
  const completed: Array<{ task: Task; timeSpent: number }> = [];

  for (const entry of entries) {
    const task = normalizeTask(entry);
    if (!task || !task.completed) {
      continue;
    }
    const actual = actualTimeSchema.safeParse(entry);
    const actualTime = actual.success ? actual.data.actual_time : undefined;
    completed.push({ task, timeSpent: actualTime ?? task.estimated_time });
  }

  const byPriority = emptyBreakdown();
  if (completed.length === 0) {
    return {
      total_completed: 0,
      total_time_spent: 0,
      avg_completion_time: 0,
      completed_by_priority: byPriority,
      productivity_score: 0,
    };
  }

  for (const { task } of completed) {
    byPriority[task.priority]++;
  }

  const totalTime = completed.reduce((sum, entry) => sum + entry.timeSpent, 0);
  const productivity = Math.min(100, completed.length * 10 + Math.min(totalTime / 60, 40));

  return {
    total_completed: completed.length,
    total_time_spent: totalTime,
    avg_completion_time: roundOne(totalTime / completed.length),
    completed_by_priority: byPriority,
    productivity_score: roundOne(productivity),
  };
}

/**
 * Time Allocator
 * Greedily grants a time budget to an already-sorted task sequence.
 *
 * Rules, per task:
 * 1. Fits in the remaining budget → allocate fully.
 * 2. Otherwise, remaining budget >= minimum chunk → allocate the remainder (partial) and stop.
 * 3. Otherwise skip it; a later, shorter task may still fit.
 */

import { logger } from "../../utils/logger";
import { BreakSuggestionProvider, defaultBreakSuggestionProvider } from "./break-suggestions";
import type { AllocationResult, ScheduledTask, Task } from "./types";

export const MIN_CHUNK_MINUTES = 15;

export interface AllocationOptions {
  minChunkMinutes?: number;
  breakSuggestions?: BreakSuggestionProvider;
}

export function completionPercentage(allocated: number, estimated: number): number {
  if (estimated <= 0) {
    return 0;
  }
  return Math.min(100, Math.round((allocated / estimated) * 1000) / 10);
}

function annotate(
  task: Task,
  allocated: number,
  order: number,
  provider: BreakSuggestionProvider,
): ScheduledTask {
  const suggestion = provider.suggest({ allocatedMinutes: allocated, order });

  return {
    ...task,
    allocated_time: allocated,
    remaining_time: Math.max(0, task.estimated_time - allocated),
    completion_percentage: completionPercentage(allocated, task.estimated_time),
    schedule_order: order,
    partial: allocated < task.estimated_time,
    break_after: suggestion.minutes,
    break_suggestion: suggestion.text,
  };
}

export function allocateTime(
  sortedTasks: readonly Task[],
  budget: number,
  options: AllocationOptions = {},
): AllocationResult {
  const minChunk = options.minChunkMinutes ?? MIN_CHUNK_MINUTES;
  const provider = options.breakSuggestions ?? defaultBreakSuggestionProvider;

  if (sortedTasks.length === 0 || !(budget > 0)) {
    return { scheduled: [], unscheduled: [...sortedTasks], remaining_budget: 0 };
  }

  let remaining = Math.floor(budget);
  const scheduled: ScheduledTask[] = [];
  const unscheduled: Task[] = [];

  for (const task of sortedTasks) {
    if (remaining <= 0) {
      unscheduled.push(task);
      continue;
    }

    let allocated: number;
    if (task.estimated_time <= remaining) {
      allocated = task.estimated_time;
    } else if (remaining >= minChunk) {
      allocated = remaining;
    } else {
      unscheduled.push(task);
      continue;
    }

    remaining -= allocated;
    scheduled.push(annotate(task, allocated, scheduled.length + 1, provider));
  }

  // A leftover >= minChunk means no task was skipped or cut short, so every
  // task was granted in full and there is nothing left to backfill.

  logger.debug("Time allocated", {
    budget,
    scheduledCount: scheduled.length,
    unscheduledCount: unscheduled.length,
    remainingBudget: remaining,
  });

  return { scheduled, unscheduled, remaining_budget: remaining };
}

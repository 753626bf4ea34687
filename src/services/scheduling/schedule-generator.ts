/**
 * Schedule Generator
 * Flat schedule for one time budget: normalize → (split) → sort → allocate.
 */

import { logger } from "../../utils/logger";
import { metrics } from "../../utils/metrics";
import { normalizeBudget, normalizeTasks } from "./task-normalizer";
import { sortTasks } from "./task-sorter";
import { splitTasks } from "./task-splitter";
import { allocateTime, AllocationOptions } from "./time-allocator";
import type { AllocationResult, Task } from "./types";

export interface ScheduleOptions extends AllocationOptions {
  today?: Date;
  maxSessionMinutes?: number;
  demoteLaterSessions?: boolean;
}

const EMPTY_RESULT: AllocationResult = { scheduled: [], unscheduled: [], remaining_budget: 0 };

/**
 * Normalize raw input and keep only tasks that still need work.
 * Returns null when the input is not a task list at all.
 */
export function prepareTasks(rawTasks: unknown, options: ScheduleOptions = {}): Task[] | null {
  const { tasks, rejected } = normalizeTasks(rawTasks);
  if (rejected) {
    return null;
  }

  const active = tasks.filter((task) => !task.completed);
  if (options.maxSessionMinutes === undefined) {
    return active;
  }

  return splitTasks(active, options.maxSessionMinutes, {
    demoteLaterSessions: options.demoteLaterSessions,
  });
}

export function generateSchedule(
  rawTasks: unknown,
  availableTime: unknown,
  options: ScheduleOptions = {},
): AllocationResult {
  const start = Date.now();
  const budget = normalizeBudget(availableTime);
  const tasks = prepareTasks(rawTasks, options);

  if (budget === null || tasks === null) {
    metrics.increment("scheduling.rejected", { operation: "generate" });
    return { ...EMPTY_RESULT, unscheduled: tasks ?? [] };
  }

  const sorted = sortTasks(tasks, options.today);
  const result = allocateTime(sorted, budget, options);

  metrics.increment("scheduling.generated", { operation: "generate" });
  metrics.timing("scheduling.generate", Date.now() - start);

  logger.debug("Schedule generated", {
    taskCount: tasks.length,
    budget,
    scheduledCount: result.scheduled.length,
    partialCount: result.scheduled.filter((task) => task.partial).length,
  });

  return result;
}

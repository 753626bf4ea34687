/**
 * Multi-Slot Planner
 * Runs the allocator once per named time slot, carrying unclaimed tasks forward.
 * A task granted any time in a slot (full or partial) is not offered to later slots.
 */

import { logger } from "../../utils/logger";
import { metrics } from "../../utils/metrics";
import { normalizeBudget } from "./task-normalizer";
import { prepareTasks, ScheduleOptions } from "./schedule-generator";
import { sortTasks } from "./task-sorter";
import { allocateTime } from "./time-allocator";
import type { DailyPlan, ScheduledTask, SlotSchedule, Task, TimeSlot } from "./types";

export const UNSCHEDULED_KEY = "Unscheduled";

export const DEFAULT_SLOTS: readonly TimeSlot[] = [
  { name: "Morning Focus", minutes: 120 },
  { name: "Afternoon Work", minutes: 90 },
  { name: "Evening Tasks", minutes: 60 },
];

export function planDay(
  rawTasks: unknown,
  slots: readonly TimeSlot[] = DEFAULT_SLOTS,
  options: ScheduleOptions = {},
): DailyPlan {
  const tasks = prepareTasks(rawTasks, options) ?? [];
  const inputOrder = new Map<Task, number>(tasks.map((task, index) => [task, index]));
  const effectiveSlots = slots.length > 0 ? slots : DEFAULT_SLOTS;

  let pool: Task[] = tasks;
  let totalAllocated = 0;
  const slotSchedules: SlotSchedule[] = [];

  for (const slot of effectiveSlots) {
    const minutes = normalizeBudget(slot.minutes) ?? 0;

    if (pool.length === 0 || minutes === 0) {
      slotSchedules.push({ name: slot.name, minutes, tasks: [] });
      continue;
    }

    const result = allocateTime(sortTasks(pool, options.today), minutes, options);
    totalAllocated += result.scheduled.reduce((sum, task) => sum + task.allocated_time, 0);
    slotSchedules.push({ name: slot.name, minutes, tasks: result.scheduled });
    pool = result.unscheduled;
  }

  const unscheduled = [...pool].sort(
    (a, b) => (inputOrder.get(a) ?? 0) - (inputOrder.get(b) ?? 0),
  );

  metrics.increment("scheduling.generated", { operation: "plan_day" });
  logger.debug("Daily plan generated", {
    slotCount: slotSchedules.length,
    taskCount: tasks.length,
    unscheduledCount: unscheduled.length,
    totalAllocated,
  });

  return { slots: slotSchedules, unscheduled, total_allocated_time: totalAllocated };
}

/**
 * Flatten a plan into a record keyed by slot name, with leftovers under "Unscheduled".
 */
export function toSlotMapping(plan: DailyPlan): Record<string, Array<ScheduledTask | Task>> {
  const mapping: Record<string, Array<ScheduledTask | Task>> = {};

  for (const slot of plan.slots) {
    mapping[slot.name] = slot.tasks;
  }

  if (plan.unscheduled.length > 0) {
    mapping[UNSCHEDULED_KEY] = plan.unscheduled;
  }

  return mapping;
}

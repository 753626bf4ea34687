/**
 * Task Splitter
 * Breaks an oversized task into evenly sized sub-sessions.
 */

import type { PriorityTier, SubTask, Task } from "./types";

export interface SplitOptions {
  demoteLaterSessions?: boolean;
}

const DEMOTED_TIER: Record<PriorityTier, PriorityTier> = {
  high: "medium",
  medium: "low",
  low: "low",
};

export function demotePriority(tier: PriorityTier): PriorityTier {
  return DEMOTED_TIER[tier];
}

export function splitTask(
  task: Task,
  maxSessionMinutes: number,
  options: SplitOptions = {},
): Array<Task | SubTask> {
  if (!(maxSessionMinutes >= 1) || task.estimated_time <= maxSessionMinutes) {
    return [task];
  }

  const demote = options.demoteLaterSessions ?? true;
  const totalSessions = Math.ceil(task.estimated_time / maxSessionMinutes);
  const perSession = Math.round(task.estimated_time / totalSessions);
  const subTasks: SubTask[] = [];

  for (let sessionIndex = 1; sessionIndex <= totalSessions; sessionIndex++) {
    subTasks.push({
      ...task,
      id: task.id === undefined ? undefined : `${task.id}:${sessionIndex}`,
      title: `${task.title} (Part ${sessionIndex}/${totalSessions})`,
      estimated_time: perSession,
      priority: demote && sessionIndex > 1 ? demotePriority(task.priority) : task.priority,
      session_index: sessionIndex,
      total_sessions: totalSessions,
      parent_id: task.id ?? null,
      parent_title: task.title,
    });
  }

  return subTasks;
}

export function splitTasks(
  tasks: readonly Task[],
  maxSessionMinutes: number,
  options: SplitOptions = {},
): Array<Task | SubTask> {
  return tasks.flatMap((task) => splitTask(task, maxSessionMinutes, options));
}

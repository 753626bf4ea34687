/**
 * Recommendation Generator
 * Short advisory messages derived from the whole task set (active and completed).
 * Triggers are evaluated independently and emitted in a fixed order, capped at MAX_RECOMMENDATIONS.
 */

import { logger } from "../../utils/logger";
import { getDaysUntilDeadline } from "./priority-scorer";
import { normalizeTasks } from "./task-normalizer";
import type { Task } from "./types";

export const MAX_RECOMMENDATIONS = 5;
export const EMPTY_TASKS_MESSAGE = "Start by adding some tasks to get organized!";
export const ALL_GOOD_MESSAGE = "Great job! Your task management looks well-organized.";

interface RecommendationThresholds {
  maxActiveTasks: number;
  minActiveTasks: number;
  maxHighPriority: number;
  maxTotalMinutes: number;
  lowCompletionRate: number;
  highCompletionRate: number;
  longTaskMinutes: number;
  dueSoonDays: number;
}

const DEFAULT_THRESHOLDS: RecommendationThresholds = {
  maxActiveTasks: 20,
  minActiveTasks: 3,
  maxHighPriority: 5,
  maxTotalMinutes: 480,
  lowCompletionRate: 30,
  highCompletionRate: 80,
  longTaskMinutes: 120,
  dueSoonDays: 2,
};

type Trigger = (context: TaskSetContext) => string | null;

interface TaskSetContext {
  all: Task[];
  active: Task[];
  today: Date;
  thresholds: RecommendationThresholds;
}

const triggers: Trigger[] = [
  ({ active, today }) => {
    const overdue = active.filter((task) => {
      const days = getDaysUntilDeadline(task.deadline, today);
      return days !== null && days < 0;
    }).length;
    return overdue > 0
      ? `You have ${overdue} overdue task(s). Consider rescheduling or prioritizing them.`
      : null;
  },
  ({ active, thresholds }) => {
    if (active.length > thresholds.maxActiveTasks) {
      return `You have ${active.length} active tasks. Consider deferring or delegating some to stay focused.`;
    }
    if (active.length < thresholds.minActiveTasks) {
      return "You have only a few active tasks. Plan ahead by adding upcoming work.";
    }
    return null;
  },
  ({ active, thresholds }) => {
    const high = active.filter((task) => task.priority === "high").length;
    if (high > thresholds.maxHighPriority) {
      return "You have many high-priority tasks. Consider reviewing priorities to focus on what's truly urgent.";
    }
    if (high === 0 && active.length > 0) {
      return "None of your active tasks are high priority. Mark the most important ones so they get scheduled first.";
    }
    return null;
  },
  ({ active, thresholds }) => {
    const totalMinutes = active.reduce((sum, task) => sum + task.estimated_time, 0);
    return totalMinutes > thresholds.maxTotalMinutes
      ? "Your tasks require significant time. Consider spreading them across multiple days."
      : null;
  },
  ({ all, active, thresholds }) => {
    const rate = ((all.length - active.length) / all.length) * 100;
    if (rate < thresholds.lowCompletionRate) {
      return "Your completion rate is low. Start with a few short tasks to build momentum.";
    }
    if (rate > thresholds.highCompletionRate) {
      return "Your completion rate is excellent. Consider taking on more ambitious goals.";
    }
    return null;
  },
  ({ active }) => {
    const withDeadline = active.filter((task) => task.deadline !== null).length;
    return active.length > 0 && withDeadline < active.length / 2
      ? "Many tasks don't have deadlines. Setting deadlines can improve time management and motivation."
      : null;
  },
  ({ active, thresholds }) => {
    const long = active.filter((task) => task.estimated_time > thresholds.longTaskMinutes).length;
    return active.length > 0 && long > active.length / 3
      ? "Consider breaking down large tasks into smaller, more manageable chunks for better productivity."
      : null;
  },
  ({ active, today, thresholds }) => {
    const dueSoon = active.filter((task) => {
      const days = getDaysUntilDeadline(task.deadline, today);
      return days !== null && days >= 0 && days <= thresholds.dueSoonDays;
    }).length;
    return dueSoon > 0
      ? `You have ${dueSoon} task(s) due within ${thresholds.dueSoonDays} days. Consider prioritizing them in your schedule.`
      : null;
  },
];

export function generateRecommendations(
  rawTasks: unknown,
  today: Date = new Date(),
  thresholds: Partial<RecommendationThresholds> = {},
): string[] {
  const { tasks } = normalizeTasks(rawTasks);

  if (tasks.length === 0) {
    return [EMPTY_TASKS_MESSAGE];
  }

  const context: TaskSetContext = {
    all: tasks,
    active: tasks.filter((task) => !task.completed),
    today,
    thresholds: { ...DEFAULT_THRESHOLDS, ...thresholds },
  };

  const recommendations: string[] = [];
  for (const trigger of triggers) {
    const message = trigger(context);
    if (message) {
      recommendations.push(message);
    }
  }

  logger.debug("Recommendations generated", {
    taskCount: tasks.length,
    triggered: recommendations.length,
  });

  if (recommendations.length === 0) {
    return [ALL_GOOD_MESSAGE];
  }

  return recommendations.slice(0, MAX_RECOMMENDATIONS);
}

import { scoreTask } from "./priority-scorer";
import type { Task } from "./types";

/**
 * Order tasks most desirable first.
 * Ties fall back to shorter estimate, then to input position.
 */
export function sortTasks<T extends Task>(tasks: readonly T[], today: Date = new Date()): T[] {
  const ranked = tasks.map((task, index) => ({
    task,
    index,
    score: scoreTask(task, today),
  }));

  ranked.sort((a, b) => {
    if (a.score !== b.score) return b.score - a.score;
    if (a.task.estimated_time !== b.task.estimated_time) {
      return a.task.estimated_time - b.task.estimated_time;
    }
    return a.index - b.index;
  });

  return ranked.map((entry) => entry.task);
}

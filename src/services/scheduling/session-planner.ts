/**
 * Session Planner
 * Repacks tasks into fixed-length focus sessions (Pomodoro style) with breaks in between.
 * Every 4th focus session is followed by a long break; no break follows the final session.
 */

import { logger } from "../../utils/logger";
import { metrics } from "../../utils/metrics";
import { prepareTasks } from "./schedule-generator";
import { sortTasks } from "./task-sorter";
import type { BreakSession, FocusSession, Session, SessionPlan, Task } from "./types";

export const DEFAULT_SESSION_LENGTH = 25;
export const DEFAULT_BREAK_LENGTH = 5;
export const LONG_BREAK_INTERVAL = 4;
export const LONG_BREAK_MULTIPLIER = 3;

export interface SessionOptions {
  sessionLength?: number;
  breakLength?: number;
  today?: Date;
}

type FocusBlock = Omit<FocusSession, "start_minute" | "end_minute">;

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? Math.round(value) : fallback;
}

function focusBlocksFor(task: Task, sessionLength: number): FocusBlock[] {
  const needed = Math.ceil(task.estimated_time / sessionLength);
  const blocks: FocusBlock[] = [];

  for (let index = 1; index <= needed; index++) {
    const duration =
      index < needed
        ? sessionLength
        : Math.min(sessionLength, task.estimated_time - sessionLength * (needed - 1));

    blocks.push({
      type: "focus",
      task_id: task.id ?? null,
      title: task.title,
      priority: task.priority,
      session_index: index,
      total_sessions: needed,
      duration,
    });
  }

  return blocks;
}

export function planSessions(rawTasks: unknown, options: SessionOptions = {}): SessionPlan {
  const sessionLength = positiveOr(options.sessionLength, DEFAULT_SESSION_LENGTH);
  const breakLength = positiveOr(options.breakLength, DEFAULT_BREAK_LENGTH);
  const tasks = sortTasks(prepareTasks(rawTasks) ?? [], options.today);

  const blocks = tasks.flatMap((task) => focusBlocksFor(task, sessionLength));
  const sessions: Session[] = [];
  let cursor = 0;
  let focusMinutes = 0;
  let breakMinutes = 0;

  blocks.forEach((block, index) => {
    sessions.push({ ...block, start_minute: cursor, end_minute: cursor + block.duration });
    cursor += block.duration;
    focusMinutes += block.duration;

    if (index === blocks.length - 1) {
      return;
    }

    const isLong = (index + 1) % LONG_BREAK_INTERVAL === 0;
    const duration = isLong ? breakLength * LONG_BREAK_MULTIPLIER : breakLength;
    const pause: BreakSession = {
      type: "break",
      kind: isLong ? "long" : "short",
      duration,
      start_minute: cursor,
      end_minute: cursor + duration,
    };
    sessions.push(pause);
    cursor += duration;
    breakMinutes += duration;
  });

  metrics.increment("scheduling.generated", { operation: "plan_sessions" });
  logger.debug("Session plan generated", {
    taskCount: tasks.length,
    focusSessions: blocks.length,
    totalMinutes: cursor,
  });

  return {
    sessions,
    focus_session_count: blocks.length,
    focus_minutes: focusMinutes,
    break_minutes: breakMinutes,
    total_minutes: cursor,
  };
}

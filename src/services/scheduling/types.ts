/**
 * Scheduling Engine Types
 * Plain records exchanged with callers. Field names match the serialized shape.
 */

export type PriorityTier = "high" | "medium" | "low";

export const PRIORITY_TIERS: readonly PriorityTier[] = ["high", "medium", "low"] as const;

export interface Task {
  id?: string | number;
  title: string;
  estimated_time: number; // minutes, > 0
  priority: PriorityTier;
  deadline: string | null; // YYYY-MM-DD
  completed: boolean;
}

export interface ScheduledTask extends Task {
  allocated_time: number;
  remaining_time: number;
  completion_percentage: number;
  schedule_order: number;
  partial: boolean;
  break_after: number;
  break_suggestion: string;
}

export interface SubTask extends Task {
  session_index: number;
  total_sessions: number;
  parent_id: string | number | null;
  parent_title: string;
}

export interface AllocationResult {
  scheduled: ScheduledTask[];
  unscheduled: Task[];
  remaining_budget: number;
}

export interface TimeSlot {
  name: string;
  minutes: number;
}

export interface SlotSchedule extends TimeSlot {
  tasks: ScheduledTask[];
}

export interface DailyPlan {
  slots: SlotSchedule[];
  unscheduled: Task[];
  total_allocated_time: number;
}

export interface FocusSession {
  type: "focus";
  task_id: string | number | null;
  title: string;
  priority: PriorityTier;
  session_index: number;
  total_sessions: number;
  duration: number;
  start_minute: number;
  end_minute: number;
}

export interface BreakSession {
  type: "break";
  kind: "short" | "long";
  duration: number;
  start_minute: number;
  end_minute: number;
}

export type Session = FocusSession | BreakSession;

export interface SessionPlan {
  sessions: Session[];
  focus_session_count: number;
  focus_minutes: number;
  break_minutes: number;
  total_minutes: number;
}

export type QualityRating = "poor" | "fair" | "good" | "excellent";

export interface ScheduleDiagnostics {
  time_utilization: number; // 0-100
  priority_weighted_score: number; // 0-100
  quality_rating: QualityRating;
  quality_score: number; // 0-100
  total_allocated_time: number;
  scheduled_count: number;
  partial_count: number;
}

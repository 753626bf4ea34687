/**
 * Task Scheduling Service
 * Priority scoring, greedy time allocation, day and focus-session planning, and schedule diagnostics.
 */

// Types
export type {
  PriorityTier,
  Task,
  ScheduledTask,
  SubTask,
  AllocationResult,
  TimeSlot,
  SlotSchedule,
  DailyPlan,
  FocusSession,
  BreakSession,
  Session,
  SessionPlan,
  QualityRating,
  ScheduleDiagnostics,
} from "./types";

// Input normalization
export {
  normalizeTask,
  normalizeTasks,
  normalizeBudget,
  parseDeadline,
  DEFAULT_TITLE,
  DEFAULT_ESTIMATED_TIME,
  DEFAULT_PRIORITY,
  type NormalizedTasks,
} from "./task-normalizer";

// Scoring and ordering
export {
  scoreTask,
  explainScore,
  getUrgencyTier,
  getDaysUntilDeadline,
  TIER_BASE_SCORES,
  URGENCY_BOOSTS,
  type UrgencyTier,
  type ScoreBreakdown,
} from "./priority-scorer";
export { sortTasks } from "./task-sorter";

// Allocation
export {
  allocateTime,
  completionPercentage,
  MIN_CHUNK_MINUTES,
  type AllocationOptions,
} from "./time-allocator";
export { generateSchedule, prepareTasks, type ScheduleOptions } from "./schedule-generator";
export { splitTask, splitTasks, demotePriority, type SplitOptions } from "./task-splitter";

// Planning
export { planDay, toSlotMapping, DEFAULT_SLOTS, UNSCHEDULED_KEY } from "./multi-slot-planner";
export {
  planSessions,
  DEFAULT_SESSION_LENGTH,
  DEFAULT_BREAK_LENGTH,
  type SessionOptions,
} from "./session-planner";

// Diagnostics
export {
  analyzeSchedule,
  calculateQualityScore,
  rateQuality,
  PRIORITY_WEIGHTS,
  type AnalyzableTask,
} from "./schedule-analyzer";
export {
  generateRecommendations,
  EMPTY_TASKS_MESSAGE,
  ALL_GOOD_MESSAGE,
  MAX_RECOMMENDATIONS,
} from "./recommendation-generator";
export {
  estimateCompletion,
  calculateCompletionStats,
  type CompletionEstimate,
  type CompletionStats,
  type EstimateOptions,
} from "./completion-estimator";

// Break suggestions
export {
  createDefaultBreakSuggestionProvider,
  createRandomBreakSuggestionProvider,
  defaultBreakSuggestionProvider,
  recommendedBreakMinutes,
  BREAK_ACTIVITIES,
  type BreakSuggestionProvider,
  type BreakSuggestion,
  type BreakSuggestionRequest,
} from "./break-suggestions";

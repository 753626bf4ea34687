/**
 * Scheduling API
 * Endpoints for flat schedules, day plans, focus sessions, task splitting and diagnostics.
 * Request bodies may carry their own task list; otherwise tasks come from the repository.
 */

import { Router, Request, Response } from "express";
import { z } from "zod";
import { validate } from "../middleware/validation.middleware";
import { AppError, asyncHandler } from "../middleware/error-handler";
import { logger } from "../utils/logger";
import type { SchedulerDefaults } from "../utils/env";
import type { TaskRepository } from "../repositories/task.repository";
import {
  analyzeSchedule,
  calculateCompletionStats,
  completionPercentage,
  estimateCompletion,
  generateRecommendations,
  generateSchedule,
  normalizeTask,
  planDay,
  planSessions,
  splitTask,
  toSlotMapping,
  UNSCHEDULED_KEY,
} from "../services/scheduling";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const taskListSchema = z.array(z.unknown()).max(1000);
const minutesSchema = z.coerce.number().int().min(0);
const positiveMinutesSchema = z.coerce.number().int().positive();

const generateSchema = z.object({
  tasks: taskListSchema.optional(),
  available_time: minutesSchema,
  max_session_minutes: positiveMinutesSchema.optional(),
});

const dailyPlanSchema = z.object({
  tasks: taskListSchema.optional(),
  slots: z
    .array(
      z.object({
        name: z.string().trim().min(1).max(100),
        minutes: minutesSchema,
      }),
    )
    .min(1)
    .refine((slots) => new Set(slots.map((s) => s.name)).size === slots.length, {
      message: "Slot names must be unique",
    })
    .refine((slots) => slots.every((s) => s.name !== UNSCHEDULED_KEY), {
      message: `"${UNSCHEDULED_KEY}" is a reserved slot name`,
    })
    .optional(),
});

const sessionsSchema = z.object({
  tasks: taskListSchema.optional(),
  session_length: positiveMinutesSchema.optional(),
  break_length: positiveMinutesSchema.optional(),
});

const splitSchema = z.object({
  task: z.record(z.unknown()),
  max_session_minutes: positiveMinutesSchema,
});

const analyzeSchema = z.object({
  available_time: minutesSchema,
  schedule: z.array(
    z.object({
      priority: z.enum(["high", "medium", "low"]),
      allocated_time: minutesSchema,
      estimated_time: positiveMinutesSchema.optional(),
      completion_percentage: z.number().min(0).max(100).optional(),
      partial: z.boolean().optional(),
    }),
  ),
});

const recommendationsSchema = z.object({
  tasks: taskListSchema.optional(),
});

const estimateSchema = z.object({
  tasks: taskListSchema.optional(),
  efficiency_factor: z.number().gt(0).max(1).optional(),
  daily_capacity: positiveMinutesSchema.optional(),
});

const createTaskSchema = z.object({
  title: z.string().trim().min(1).max(255),
  estimated_time: z.coerce.number().int().positive().optional(),
  priority: z
    .union([z.enum(["high", "medium", "low"]), z.literal(1), z.literal(2), z.literal(3)])
    .optional(),
  deadline: z.string().regex(ISO_DATE, "Expected YYYY-MM-DD").nullable().optional(),
  completed: z.boolean().optional(),
});

const completeTaskSchema = z.object({
  actual_time: z.coerce.number().int().positive().optional(),
});

const taskIdParamsSchema = z.object({
  id: z.string().uuid("Invalid task ID"),
});

export function createSchedulingRouter(
  repository: TaskRepository,
  defaults: SchedulerDefaults,
): Router {
  const router = Router();

  const activeTasks = async (provided: unknown[] | undefined): Promise<unknown[]> =>
    provided ?? (await repository.findActive());

  const allTasks = async (provided: unknown[] | undefined): Promise<unknown[]> =>
    provided ?? (await repository.findAll());

  /**
   * GET /tasks
   */
  router.get(
    "/tasks",
    asyncHandler(async (_req: Request, res: Response) => {
      const tasks = await repository.findAll();
      res.json({ tasks, total: tasks.length });
    }),
  );

  /**
   * POST /tasks
   */
  router.post(
    "/tasks",
    validate({ body: createTaskSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const input = createTaskSchema.parse(req.body);
      const task = await repository.create(input);

      logger.info("Task created", { taskId: task.id, priority: task.priority });
      res.status(201).json({ task });
    }),
  );

  /**
   * POST /tasks/:id/complete
   */
  router.post(
    "/tasks/:id/complete",
    validate({ params: taskIdParamsSchema, body: completeTaskSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = taskIdParamsSchema.parse(req.params);
      const { actual_time } = completeTaskSchema.parse(req.body ?? {});

      const task = await repository.markCompleted(id, actual_time);
      if (!task) {
        throw new AppError(404, "Task not found");
      }

      res.json({ task });
    }),
  );

  /**
   * POST /tasks/split
   * Split one task into sub-sessions no longer than max_session_minutes
   */
  router.post(
    "/tasks/split",
    validate({ body: splitSchema }),
    (req: Request, res: Response) => {
      const { task: rawTask, max_session_minutes } = splitSchema.parse(req.body);
      const task = normalizeTask(rawTask);
      const tasks = task ? splitTask(task, max_session_minutes) : [];

      res.json({ tasks, total_sessions: tasks.length });
    },
  );

  /**
   * POST /schedules/generate
   * Flat schedule for a single time budget, with diagnostics
   */
  router.post(
    "/schedules/generate",
    validate({ body: generateSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const body = generateSchema.parse(req.body);
      const tasks = await activeTasks(body.tasks);

      const result = generateSchedule(tasks, body.available_time, {
        minChunkMinutes: defaults.minChunkMinutes,
        maxSessionMinutes: body.max_session_minutes,
      });

      logger.info("Schedule generated", {
        taskCount: tasks.length,
        availableTime: body.available_time,
        scheduledCount: result.scheduled.length,
      });

      res.json({
        schedule: result.scheduled,
        unscheduled: result.unscheduled,
        remaining_time: result.remaining_budget,
        diagnostics: analyzeSchedule(result.scheduled, body.available_time),
      });
    }),
  );

  /**
   * POST /schedules/daily
   * Multi-slot plan; leftovers are reported under "Unscheduled"
   */
  router.post(
    "/schedules/daily",
    validate({ body: dailyPlanSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const body = dailyPlanSchema.parse(req.body);
      const tasks = await activeTasks(body.tasks);

      const plan = planDay(tasks, body.slots, { minChunkMinutes: defaults.minChunkMinutes });

      res.json({
        schedule: toSlotMapping(plan),
        slots: plan.slots.map((slot) => ({
          name: slot.name,
          minutes: slot.minutes,
          allocated_time: slot.tasks.reduce((sum, task) => sum + task.allocated_time, 0),
          task_count: slot.tasks.length,
        })),
        total_allocated_time: plan.total_allocated_time,
      });
    }),
  );

  /**
   * POST /schedules/sessions
   * Focus-session plan with short and long breaks
   */
  router.post(
    "/schedules/sessions",
    validate({ body: sessionsSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const body = sessionsSchema.parse(req.body);
      const tasks = await activeTasks(body.tasks);

      const plan = planSessions(tasks, {
        sessionLength: body.session_length ?? defaults.sessionLength,
        breakLength: body.break_length ?? defaults.breakLength,
      });

      res.json(plan);
    }),
  );

  /**
   * POST /schedules/analyze
   * Diagnostics for a schedule produced earlier
   */
  router.post(
    "/schedules/analyze",
    validate({ body: analyzeSchema }),
    (req: Request, res: Response) => {
      const body = analyzeSchema.parse(req.body);

      const schedule = body.schedule.map((task) => {
        const estimated = task.estimated_time ?? task.allocated_time;
        return {
          priority: task.priority,
          allocated_time: task.allocated_time,
          completion_percentage:
            task.completion_percentage ?? completionPercentage(task.allocated_time, estimated),
          partial: task.partial ?? task.allocated_time < estimated,
        };
      });

      res.json({ diagnostics: analyzeSchedule(schedule, body.available_time) });
    },
  );

  /**
   * POST /schedules/estimate
   * Backlog completion forecast plus stats over completed tasks
   */
  router.post(
    "/schedules/estimate",
    validate({ body: estimateSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const body = estimateSchema.parse(req.body);
      const tasks = await allTasks(body.tasks);

      res.json({
        estimate: estimateCompletion(tasks, {
          efficiencyFactor: body.efficiency_factor,
          dailyCapacity: body.daily_capacity,
        }),
        completion_stats: calculateCompletionStats(tasks),
      });
    }),
  );

  /**
   * POST /recommendations
   */
  router.post(
    "/recommendations",
    validate({ body: recommendationsSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const body = recommendationsSchema.parse(req.body);
      const tasks = await allTasks(body.tasks);

      res.json({ recommendations: generateRecommendations(tasks) });
    }),
  );

  return router;
}

import { v4 as uuidv4 } from "uuid";
import { normalizeTask } from "../services/scheduling";
import type { Task } from "../services/scheduling";

export interface StoredTask extends Task {
  id: string;
  actual_time?: number;
  created_at: Date;
  completed_at: Date | null;
}

export interface CreateTaskInput {
  title: string;
  estimated_time?: number;
  priority?: Task["priority"] | 1 | 2 | 3;
  deadline?: string | null;
  completed?: boolean;
}

/**
 * Storage seam for the API layer. The scheduling engine only ever sees the plain
 * Task records these methods return.
 */
export interface TaskRepository {
  findAll(): Promise<StoredTask[]>;
  findActive(): Promise<StoredTask[]>;
  findById(id: string): Promise<StoredTask | null>;
  create(input: CreateTaskInput): Promise<StoredTask>;
  markCompleted(id: string, actualTime?: number): Promise<StoredTask | null>;
}

export class InMemoryTaskRepository implements TaskRepository {
  private tasks = new Map<string, StoredTask>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async findAll(): Promise<StoredTask[]> {
    return [...this.tasks.values()].map((task) => ({ ...task }));
  }

  async findActive(): Promise<StoredTask[]> {
    return (await this.findAll()).filter((task) => !task.completed);
  }

  async findById(id: string): Promise<StoredTask | null> {
    const task = this.tasks.get(id);
    return task ? { ...task } : null;
  }

  async create(input: CreateTaskInput): Promise<StoredTask> {
    const normalized = normalizeTask(input);
    if (!normalized) {
      throw new Error("Task input must be an object");
    }

    const createdAt = this.now();
    const task: StoredTask = {
      ...normalized,
      id: uuidv4(),
      created_at: createdAt,
      completed_at: normalized.completed ? createdAt : null,
    };

    this.tasks.set(task.id, task);
    return { ...task };
  }

  async markCompleted(id: string, actualTime?: number): Promise<StoredTask | null> {
    const task = this.tasks.get(id);
    if (!task) {
      return null;
    }

    const updated: StoredTask = {
      ...task,
      completed: true,
      completed_at: task.completed_at ?? this.now(),
      ...(actualTime !== undefined ? { actual_time: actualTime } : {}),
    };

    this.tasks.set(id, updated);
    return { ...updated };
  }
}

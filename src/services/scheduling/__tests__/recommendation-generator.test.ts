import {
  ALL_GOOD_MESSAGE,
  EMPTY_TASKS_MESSAGE,
  generateRecommendations,
  MAX_RECOMMENDATIONS,
} from "../recommendation-generator";

const today = new Date(2025, 7, 2);

const OVERDUE = "You have 1 overdue task(s). Consider rescheduling or prioritizing them.";
const DUE_SOON = "You have 1 task(s) due within 2 days. Consider prioritizing them in your schedule.";
const FEW_TASKS = "You have only a few active tasks. Plan ahead by adding upcoming work.";
const NO_HIGH =
  "None of your active tasks are high priority. Mark the most important ones so they get scheduled first.";
const LOTS_OF_TIME = "Your tasks require significant time. Consider spreading them across multiple days.";
const LOW_RATE = "Your completion rate is low. Start with a few short tasks to build momentum.";
const HIGH_RATE = "Your completion rate is excellent. Consider taking on more ambitious goals.";
const LARGE_TASKS =
  "Consider breaking down large tasks into smaller, more manageable chunks for better productivity.";

const balanced = [
  { title: "Plan sprint", estimated_time: 60, priority: "high", deadline: "2025-08-10" },
  { title: "Review PRs", estimated_time: 30, priority: "medium", deadline: "2025-08-12" },
  { title: "Clean inbox", estimated_time: 45, priority: "low", deadline: "2025-08-20" },
  { title: "Standup notes", estimated_time: 30, completed: true },
  { title: "Fix bug", estimated_time: 30, completed: true },
];

describe("Recommendation Generator", () => {
  it("encourages adding tasks when there are none", () => {
    expect(generateRecommendations([], today)).toEqual([EMPTY_TASKS_MESSAGE]);
    expect(generateRecommendations("not a list", today)).toEqual([EMPTY_TASKS_MESSAGE]);
  });

  it("returns the all-good message when nothing triggers", () => {
    expect(generateRecommendations(balanced, today)).toEqual([ALL_GOOD_MESSAGE]);
  });

  it("flags overdue tasks", () => {
    const tasks = [
      ...balanced,
      { title: "Late", estimated_time: 30, priority: "high", deadline: "2025-07-30" },
    ];
    expect(generateRecommendations(tasks, today)).toEqual([OVERDUE]);
  });

  it("flags tasks due within two days", () => {
    const tasks = [
      ...balanced,
      { title: "Soon", estimated_time: 30, priority: "high", deadline: "2025-08-04" },
    ];
    expect(generateRecommendations(tasks, today)).toEqual([DUE_SOON]);
  });

  it("ignores completed tasks when looking for overdue work", () => {
    const tasks = [
      ...balanced,
      { title: "Old", estimated_time: 30, deadline: "2025-07-01", completed: true },
    ];
    expect(generateRecommendations(tasks, today)).toEqual([ALL_GOOD_MESSAGE]);
  });

  it("keeps the fixed order and caps the output", () => {
    const tasks = [
      { title: "Migration", estimated_time: 500, priority: "medium", deadline: "2025-07-01" },
      { title: "Notes", estimated_time: 30, priority: "low" },
    ];

    const recommendations = generateRecommendations(tasks, today);

    expect(recommendations).toHaveLength(MAX_RECOMMENDATIONS);
    expect(recommendations).toEqual([OVERDUE, FEW_TASKS, NO_HIGH, LOTS_OF_TIME, LOW_RATE]);
  });

  it("flags a crowded backlog", () => {
    const tasks = Array.from({ length: 21 }, (_, i) => ({
      title: `Task ${i + 1}`,
      estimated_time: 20,
      priority: "medium",
      deadline: "2025-08-20",
    }));

    expect(generateRecommendations(tasks, today)).toEqual([
      "You have 21 active tasks. Consider deferring or delegating some to stay focused.",
      NO_HIGH,
      LOW_RATE,
    ]);
  });

  it("flags too many high-priority tasks", () => {
    const tasks = [
      ...Array.from({ length: 6 }, (_, i) => ({
        title: `Urgent ${i + 1}`,
        estimated_time: 20,
        priority: "high",
        deadline: "2025-08-15",
      })),
      ...Array.from({ length: 4 }, (_, i) => ({
        title: `Done ${i + 1}`,
        estimated_time: 20,
        completed: true,
      })),
    ];

    expect(generateRecommendations(tasks, today)).toEqual([
      "You have many high-priority tasks. Consider reviewing priorities to focus on what's truly urgent.",
    ]);
  });

  it("flags missing deadlines", () => {
    const tasks = [
      { title: "A", estimated_time: 150, priority: "high" },
      { title: "B", estimated_time: 30, priority: "medium" },
      { title: "C", estimated_time: 30, priority: "low", deadline: "2025-08-20" },
      { title: "D", estimated_time: 30, completed: true },
    ];

    expect(generateRecommendations(tasks, today)).toEqual([
      LOW_RATE,
      "Many tasks don't have deadlines. Setting deadlines can improve time management and motivation.",
    ]);
  });

  it("flags an excellent completion rate", () => {
    const tasks = [
      ...balanced.slice(0, 3),
      ...Array.from({ length: 13 }, (_, i) => ({
        title: `Done ${i + 1}`,
        estimated_time: 20,
        completed: true,
      })),
    ];

    expect(generateRecommendations(tasks, today)).toEqual([HIGH_RATE]);
  });

  it("flags when more than a third of active tasks are large", () => {
    const tasks = [
      { title: "Migration", estimated_time: 150, priority: "high", deadline: "2025-08-10" },
      { title: "Rewrite", estimated_time: 130, priority: "medium", deadline: "2025-08-12" },
      { title: "Notes", estimated_time: 30, priority: "low", deadline: "2025-08-20" },
      { title: "Done 1", estimated_time: 30, completed: true },
      { title: "Done 2", estimated_time: 30, completed: true },
    ];

    expect(generateRecommendations(tasks, today)).toEqual([LARGE_TASKS]);
  });

  it("lists tasks due soon only after the core advice", () => {
    const tasks = [
      { title: "a", estimated_time: 300, priority: "low", deadline: "2025-07-30" },
      { title: "b", estimated_time: 300, priority: "low", deadline: "2025-08-03" },
    ];

    expect(generateRecommendations(tasks, today)).toEqual([
      OVERDUE,
      FEW_TASKS,
      NO_HIGH,
      LOTS_OF_TIME,
      LOW_RATE,
    ]);
    expect(generateRecommendations(tasks, today, { maxTotalMinutes: 1000 })).toEqual([
      OVERDUE,
      FEW_TASKS,
      NO_HIGH,
      LOW_RATE,
      LARGE_TASKS,
    ]);
  });

  it("accepts custom thresholds", () => {
    expect(generateRecommendations(balanced, today, { maxTotalMinutes: 100 })).toEqual([
      LOTS_OF_TIME,
    ]);
  });
});

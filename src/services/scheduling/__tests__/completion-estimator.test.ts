import { calculateCompletionStats, estimateCompletion } from "../completion-estimator";

const today = new Date(2025, 7, 2);

const tasks = [
  { title: "Design doc", estimated_time: 120, priority: "high" },
  { title: "Review", estimated_time: 60, priority: "medium" },
  { title: "Cleanup", estimated_time: 45, priority: "low", completed: true, actual_time: 60 },
  { title: "Notes", estimated_time: 45, priority: "high", completed: true },
];

describe("Completion Estimator", () => {
  describe("estimateCompletion", () => {
    it("forecasts the active backlog", () => {
      expect(estimateCompletion(tasks, { today })).toEqual({
        total_time: 180,
        adjusted_time: 225,
        days_needed: 0.6,
        estimated_completion: "2025-08-03",
        priority_breakdown: { high: 120, medium: 60, low: 0 },
        daily_capacity: 360,
        efficiency_factor: 0.8,
      });
    });

    it("applies custom efficiency and capacity", () => {
      const estimate = estimateCompletion(tasks, { today, efficiencyFactor: 0.5 });
      expect(estimate.adjusted_time).toBe(360);
      expect(estimate.days_needed).toBe(1);
      expect(estimate.estimated_completion).toBe("2025-08-04");

      expect(estimateCompletion(tasks, { today, dailyCapacity: 60 }).days_needed).toBe(3.8);
    });

    it("falls back to defaults for out-of-range options", () => {
      const estimate = estimateCompletion(tasks, { today, efficiencyFactor: 1.5, dailyCapacity: 0 });
      expect(estimate.efficiency_factor).toBe(0.8);
      expect(estimate.daily_capacity).toBe(360);
    });

    it("returns zeros when nothing is left to do", () => {
      expect(estimateCompletion([], { today })).toEqual({
        total_time: 0,
        adjusted_time: 0,
        days_needed: 0,
        estimated_completion: null,
        priority_breakdown: { high: 0, medium: 0, low: 0 },
        daily_capacity: 360,
        efficiency_factor: 0.8,
      });
    });
  });

  describe("calculateCompletionStats", () => {
    it("summarizes completed tasks, preferring actual time", () => {
      expect(calculateCompletionStats(tasks)).toEqual({
        total_completed: 2,
        total_time_spent: 105,
        avg_completion_time: 52.5,
        completed_by_priority: { high: 1, medium: 0, low: 1 },
        productivity_score: 21.8,
      });
    });

    it("ignores an unusable actual time", () => {
      const stats = calculateCompletionStats([
        { title: "a", estimated_time: 40, completed: true, actual_time: "a while" },
      ]);
      expect(stats.total_time_spent).toBe(40);
    });

    it("caps the productivity score at 100", () => {
      const done = Array.from({ length: 12 }, (_, i) => ({
        title: `t${i}`,
        estimated_time: 30,
        completed: true,
      }));
      expect(calculateCompletionStats(done).productivity_score).toBe(100);
    });

    it("returns zeros without completed tasks", () => {
      expect(calculateCompletionStats("nope")).toEqual({
        total_completed: 0,
        total_time_spent: 0,
        avg_completion_time: 0,
        completed_by_priority: { high: 0, medium: 0, low: 0 },
        productivity_score: 0,
      });
    });
  });
});

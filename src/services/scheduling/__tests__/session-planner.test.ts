import { planSessions } from "../session-planner";
import type { Session } from "../types";

const view = (sessions: Session[]) =>
  sessions.map((s) =>
    s.type === "focus"
      ? ["focus", s.title, s.start_minute, s.end_minute]
      : [s.kind, s.start_minute, s.end_minute],
  );

describe("Session Planner", () => {
  it("packs a long task into 25-minute sessions with a long break after the fourth", () => {
    const plan = planSessions([{ title: "Thesis", estimated_time: 120 }]);

    expect(view(plan.sessions)).toEqual([
      ["focus", "Thesis", 0, 25],
      ["short", 25, 30],
      ["focus", "Thesis", 30, 55],
      ["short", 55, 60],
      ["focus", "Thesis", 60, 85],
      ["short", 85, 90],
      ["focus", "Thesis", 90, 115],
      ["long", 115, 130],
      ["focus", "Thesis", 130, 150],
    ]);
    expect(plan.focus_session_count).toBe(5);
    expect(plan.focus_minutes).toBe(120);
    expect(plan.break_minutes).toBe(30);
    expect(plan.total_minutes).toBe(150);
  });

  it("clips the last session of a task and orders tasks by score", () => {
    const plan = planSessions([
      { title: "long", estimated_time: 25 },
      { title: "short", estimated_time: 10 },
    ]);

    expect(view(plan.sessions)).toEqual([
      ["focus", "short", 0, 10],
      ["short", 10, 15],
      ["focus", "long", 15, 40],
    ]);
  });

  it("numbers the sessions of each task", () => {
    const plan = planSessions([{ id: "x", title: "Write", estimated_time: 60 }]);
    const focus = plan.sessions.flatMap((s) =>
      s.type === "focus" ? [[s.task_id, s.session_index, s.total_sessions, s.duration]] : [],
    );

    expect(focus).toEqual([
      ["x", 1, 3, 25],
      ["x", 2, 3, 25],
      ["x", 3, 3, 10],
    ]);
  });

  it("counts long breaks across task boundaries", () => {
    const plan = planSessions(
      Array.from({ length: 5 }, (_, i) => ({ title: `t${i + 1}`, estimated_time: 20 })),
    );
    const breaks = plan.sessions.flatMap((s) => (s.type === "break" ? [s.kind] : []));

    expect(breaks).toEqual(["short", "short", "short", "long"]);
  });

  it("honours custom session and break lengths", () => {
    const plan = planSessions([{ title: "Deep", estimated_time: 100 }], {
      sessionLength: 50,
      breakLength: 10,
    });

    expect(view(plan.sessions)).toEqual([
      ["focus", "Deep", 0, 50],
      ["short", 50, 60],
      ["focus", "Deep", 60, 110],
    ]);
    expect(plan.total_minutes).toBe(110);
  });

  it("falls back to defaults for invalid lengths", () => {
    const plan = planSessions([{ title: "a", estimated_time: 30 }], {
      sessionLength: 0,
      breakLength: -5,
    });

    expect(view(plan.sessions)).toEqual([
      ["focus", "a", 0, 25],
      ["short", 25, 30],
      ["focus", "a", 30, 35],
    ]);
  });

  it("skips completed tasks and returns an empty plan for no work", () => {
    expect(planSessions([{ title: "done", estimated_time: 30, completed: true }])).toEqual({
      sessions: [],
      focus_session_count: 0,
      focus_minutes: 0,
      break_minutes: 0,
      total_minutes: 0,
    });
    expect(planSessions("nope").sessions).toEqual([]);
  });
});

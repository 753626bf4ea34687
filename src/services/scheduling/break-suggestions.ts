/**
 * Break Suggestions
 * Recommends a break length after each scheduled task and attaches a short activity hint.
 * Break minutes depend only on the allocation; the hint text comes from a swappable provider.
 */

export interface BreakSuggestionRequest {
  allocatedMinutes: number;
  order: number; // 1-based schedule position
}

export interface BreakSuggestion {
  minutes: number;
  text: string;
}

export interface BreakSuggestionProvider {
  suggest(request: BreakSuggestionRequest): BreakSuggestion;
}

export const BREAK_ACTIVITIES: readonly string[] = [
  "Stand up and stretch for a few minutes",
  "Refill your water and step away from the screen",
  "Take a short walk around the room",
  "Rest your eyes: look at something far away",
  "Do a few slow, deep breaths",
  "Tidy your desk before the next task",
  "Grab a light snack",
  "Step outside for some fresh air",
];

export function recommendedBreakMinutes(allocatedMinutes: number): number {
  if (allocatedMinutes <= 30) return 5;
  if (allocatedMinutes <= 90) return 10;
  return 15;
}

export function createDefaultBreakSuggestionProvider(
  activities: readonly string[] = BREAK_ACTIVITIES,
): BreakSuggestionProvider {
  return {
    suggest({ allocatedMinutes, order }) {
      const index = activities.length > 0 ? (Math.max(order, 1) - 1) % activities.length : -1;
      return {
        minutes: recommendedBreakMinutes(allocatedMinutes),
        text: index >= 0 ? activities[index] : "",
      };
    },
  };
}

export function createRandomBreakSuggestionProvider(
  random: () => number = Math.random,
  activities: readonly string[] = BREAK_ACTIVITIES,
): BreakSuggestionProvider {
  return {
    suggest({ allocatedMinutes }) {
      const index = Math.min(activities.length - 1, Math.floor(random() * activities.length));
      return {
        minutes: recommendedBreakMinutes(allocatedMinutes),
        text: index >= 0 ? activities[index] : "",
      };
    },
  };
}

export const defaultBreakSuggestionProvider = createDefaultBreakSuggestionProvider();

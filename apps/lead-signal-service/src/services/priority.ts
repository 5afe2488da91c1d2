import { PriorityLabel, PriorityColor } from "../types/lead";

export const HIGH_PRIORITY_THRESHOLD = 80;
export const MEDIUM_PRIORITY_THRESHOLD = 40;
export const LOW_PRIORITY_THRESHOLD = 1;

/**
 * Map a final score to its priority bucket. Depends on the score alone.
 */
export function classifyPriority(score: number): PriorityLabel {
  if (score >= HIGH_PRIORITY_THRESHOLD) return "High Priority";
  if (score >= MEDIUM_PRIORITY_THRESHOLD) return "Medium Priority";
  if (score >= LOW_PRIORITY_THRESHOLD) return "Low Priority";
  return "Junk/Error";
}

const PRIORITY_COLORS: Record<PriorityLabel, PriorityColor> = {
  "High Priority": "red",
  "Medium Priority": "orange",
  "Low Priority": "blue",
  "Junk/Error": "gray",
};

export function priorityColor(score: number): PriorityColor {
  return PRIORITY_COLORS[classifyPriority(score)];
}

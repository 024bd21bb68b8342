import { ExperienceError } from "./errors.js";

const STATE_SCORES: ReadonlyMap<string, number> = new Map([
  ["very calm", 5],
  ["calm", 4],
  ["somewhat calm", 3],
  ["neutral", 2],
  ["somewhat anxious", 1],
  ["anxious", 0],
  ["very anxious", -1],
]);

const NEGATIVE_WORDS = ["anxious", "depressed", "worried", "stress", "irritated", "tired"];
const POSITIVE_WORDS = ["calm", "relaxed", "settled", "peaceful", "satisfied", "happy"];

export type EmotionalState = {
  readonly before: string;
  readonly after: string;
};

export function createEmotionalState(before: string, after: string): EmotionalState {
  if (!before.trim()) {
    throw new ExperienceError("empty_before_state");
  }
  if (!after.trim()) {
    throw new ExperienceError("empty_after_state");
  }

  return { before: before.trim(), after: after.trim() };
}

export function hasEmotionalChange(state: EmotionalState): boolean {
  return state.before !== state.after;
}

/**
 * Known labels are compared by score. Free-text labels count as improved when
 * the before label reads negative and the after label reads positive.
 */
export function isEmotionallyImproved(state: EmotionalState): boolean {
  const beforeScore = STATE_SCORES.get(state.before.toLowerCase());
  const afterScore = STATE_SCORES.get(state.after.toLowerCase());
  if (beforeScore !== undefined && afterScore !== undefined) {
    return afterScore > beforeScore;
  }

  return containsAny(state.before, NEGATIVE_WORDS) && containsAny(state.after, POSITIVE_WORDS);
}

function containsAny(text: string, words: readonly string[]): boolean {
  const lowered = text.toLowerCase();
  return words.some((word) => lowered.includes(word));
}

import type { Story, StoryStatus } from "../db/index.js";
import { IllegalTransitionError } from "../shared/errors.js";

export const TRANSITIONS: Record<StoryStatus, readonly StoryStatus[]> = {
  pending: ["processing"],
  processing: ["chunked", "failed"],
  chunked: [],
  failed: ["processing"],
};

export function canTransition(
  story: Pick<Story, "status" | "retryCount">,
  to: StoryStatus,
  maxRetries: number
): boolean {
  if (!TRANSITIONS[story.status].includes(to)) return false;
  if (story.status === "failed" && to === "processing") {
    return story.retryCount < maxRetries;
  }
  return true;
}

export function assertTransition(
  story: Pick<Story, "status" | "retryCount">,
  to: StoryStatus,
  maxRetries: number
): void {
  if (!TRANSITIONS[story.status].includes(to)) {
    throw new IllegalTransitionError(story.status, to);
  }
  if (!canTransition(story, to, maxRetries)) {
    throw new IllegalTransitionError(
      story.status,
      to,
      `retry limit reached (${story.retryCount}/${maxRetries})`
    );
  }
}

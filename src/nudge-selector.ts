// Patient Dialogue Engine - Nudge Selector
// Picks a proactive topic for a silent or stuck speaker: the configured
// priority list first, then the rest of the repertoire in file order.
// Exhaustion is a result the caller must handle, not an exception.

import type { ConversationMemory } from "./conversation-memory.js";
import type { NudgeTopic } from "./types.js";

export type NudgeSelection =
  | { status: "selected"; topic: NudgeTopic }
  | { status: "exhausted" };

type TopicAvailability = Pick<ConversationMemory, "isAvailable">;

/** Repertoire in selection order: priority ids first, then file order, no duplicates. */
export function orderRepertoire(repertoire: readonly NudgeTopic[], priority: readonly string[]): NudgeTopic[] {
  const byId = new Map(repertoire.map((t) => [t.topicId, t]));
  const ordered: NudgeTopic[] = [];
  const seen = new Set<string>();
  for (const id of priority) {
    const topic = byId.get(id);
    if (topic && !seen.has(id)) {
      ordered.push(topic);
      seen.add(id);
    }
  }
  for (const topic of repertoire) {
    if (!seen.has(topic.topicId)) {
      ordered.push(topic);
      seen.add(topic.topicId);
    }
  }
  return ordered;
}

export function selectNudge(
  memory: TopicAvailability,
  repertoire: readonly NudgeTopic[],
  priority: readonly string[] = [],
): NudgeSelection {
  const topic = orderRepertoire(repertoire, priority).find((t) => memory.isAvailable(t.topicId));
  return topic ? { status: "selected", topic } : { status: "exhausted" };
}

/**
 * The words spoken for a nudge: the question prompt while questions are
 * welcome, otherwise the statement form. A topic without a statement is
 * offered by name so that no question slips past an exhausted budget.
 */
export function nudgeText(topic: NudgeTopic, questionsAllowed: boolean): string {
  if (questionsAllowed) return topic.prompt;
  return topic.statement ?? `We could talk about ${topic.topicId.replace(/_/g, " ")} sometime, if you like.`;
}

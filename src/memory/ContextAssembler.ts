import { ConversationTurn, DialogueTurn } from '../types/conversation';

// How many stored exchanges are replayed to the dialogue model
export const HISTORY_TURN_LIMIT = 5;

/**
 * Replays stored exchanges as alternating user/assistant turns and closes
 * with the current message, so the result always ends on a user turn.
 * Length is bounded only by how many turns the caller loaded.
 */
export function assembleDialogueContext(
  history: ConversationTurn[],
  currentMessage: string
): DialogueTurn[] {
  const turns: DialogueTurn[] = [];

  for (const turn of history) {
    turns.push({ role: 'user', content: turn.userMessage });
    turns.push({ role: 'assistant', content: turn.aiResponse });
  }

  turns.push({ role: 'user', content: currentMessage });
  return turns;
}

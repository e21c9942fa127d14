/**
 * Event Types
 *
 * Event types are open-ended strings so that new provider feeds do not need
 * a code change. The common football types are grouped into categories.
 */

export type EventCategory = 'goal' | 'card' | 'substitution' | 'shot' | 'match_state' | 'other';

const CATEGORIES: ReadonlyMap<string, EventCategory> = new Map(Object.entries<EventCategory>({
  goal: 'goal',
  own_goal: 'goal',
  penalty: 'goal',
  penalty_goal: 'goal',
  penalty_miss: 'goal',

  yellow_card: 'card',
  red_card: 'card',
  second_yellow_card: 'card',

  substitution: 'substitution',
  substitution_on: 'substitution',
  substitution_off: 'substitution',

  shot: 'shot',
  shot_on_target: 'shot',
  shot_off_target: 'shot',
  shot_blocked: 'shot',
  shot_saved: 'shot',
  shot_post: 'shot',
  shot_woodwork: 'shot',

  kick_off: 'match_state',
  half_time: 'match_state',
  full_time: 'match_state',
  extra_time: 'match_state',
  penalty_shootout: 'match_state',
}));

/** Column width of event_type in the match_events table */
const MAX_EVENT_TYPE_LENGTH = 50;

/**
 * Lowercases and trims a provider event type ("GOAL " -> "goal")
 */
export function normalizeEventType(eventType: string): string {
  return eventType.trim().toLowerCase();
}

/**
 * Checks that a (normalized) event type is non-empty, short enough and
 * made of lowercase letters, digits and underscores
 */
export function isValidEventType(eventType: string): boolean {
  return eventType.length > 0
    && eventType.length <= MAX_EVENT_TYPE_LENGTH
    && /^[a-z0-9_]+$/.test(eventType);
}

export function eventCategory(eventType: string): EventCategory {
  return CATEGORIES.get(eventType) ?? 'other';
}

export function isGoalEvent(eventType: string): boolean {
  return eventCategory(eventType) === 'goal';
}

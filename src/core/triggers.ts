/** Event assumed when a run does not name one. */
export const DEFAULT_EVENT = 'push';

export const DEFAULT_TRIGGERS: readonly string[] = ['push', 'pull_request'];

/** "Pull-Request" → "pull_request" */
export function normalizeEvent(event: string): string {
  return event.trim().toLowerCase().replace(/-/g, '_');
}

/**
 * Accepts the three shapes a job's `on` key takes: a single event, a list
 * of events, or a map keyed by event name.
 */
export function normalizeTriggers(on: string | readonly string[] | Record<string, unknown> | undefined): string[] {
  if (on === undefined) return [...DEFAULT_TRIGGERS];

  let events: readonly string[];
  if (typeof on === 'string') {
    events = [on];
  } else if (Array.isArray(on)) {
    events = on;
  } else {
    events = Object.keys(on);
  }

  return [...new Set(events.map(normalizeEvent).filter(Boolean))];
}

export function isTriggeredBy(triggers: readonly string[], event: string): boolean {
  return triggers.includes(normalizeEvent(event));
}

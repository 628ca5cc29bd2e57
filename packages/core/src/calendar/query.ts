import { expand } from './recurrence.js'
import type { EventFilter, EventTemplate, ExpandOptions, Occurrence, RosterProvider } from './types.js'

function activitiesOf(roster: RosterProvider, names: Iterable<string>, email: string): Set<string> {
  const visible = new Set<string>()
  for (const name of names) {
    if (roster.participantsOf(name).has(email)) visible.add(name)
  }
  return visible
}

/**
 * Expand every template and keep the occurrences matching the filter.
 * The date range keeps anything overlapping it, not only what it contains.
 */
export function listEvents(
  templates: EventTemplate[],
  roster: RosterProvider,
  filter: EventFilter = {},
  options: ExpandOptions = {},
): Occurrence[] {
  let occurrences = templates.flatMap((template) => expand(template, undefined, undefined, options))

  const { start, end, activity, email } = filter
  if (start) {
    occurrences = occurrences.filter((o) => o.end.getTime() >= start.getTime())
  }
  if (end) {
    occurrences = occurrences.filter((o) => o.start.getTime() <= end.getTime())
  }
  if (activity !== undefined) {
    occurrences = occurrences.filter((o) => o.activityName === activity)
  }
  if (email !== undefined) {
    const visible = activitiesOf(
      roster,
      new Set(templates.map((t) => t.activityName)),
      email,
    )
    occurrences = occurrences.filter((o) => visible.has(o.activityName))
  }

  return occurrences.sort(
    (a, b) => a.start.getTime() - b.start.getTime() || a.eventId - b.eventId,
  )
}

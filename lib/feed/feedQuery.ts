import { ONLINE_LOCATION, type HackathonEvent } from "@/types";
import { addDays, calendarDayInTimeZone, toIsoDay } from "@/lib/scrapers/timezone";

export function isOnlineEvent(event: HackathonEvent): boolean {
  return event.location === ONLINE_LOCATION;
}

export function filterOnline(events: HackathonEvent[]): HackathonEvent[] {
  return events.filter(isOnlineEvent);
}

/** Events starting between today and today + `days` (inclusive), in `timeZone`. */
export function upcomingWithin(
  events: HackathonEvent[],
  days: number,
  now = new Date(),
  timeZone?: string
): HackathonEvent[] {
  const today = calendarDayInTimeZone(now, timeZone);
  const last = addDays(today, days);
  return events.filter((e) => e.startDate >= today && e.startDate <= last);
}

function formatRange(event: HackathonEvent): string {
  const start = toIsoDay(event.startDate);
  const end = toIsoDay(event.endDate);
  return start === end ? start : `${start} → ${end}`;
}

/** "2027-03-01 → 2027-03-03  HackExample (online) [devpost] https://..." */
export function formatEventLine(event: HackathonEvent): string {
  return `${formatRange(event)}  ${event.title} (${event.location}) [${event.source}] ${event.url}`;
}

export const SOURCE_IDS = ["curated", "devpost", "mlh"] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

/** Higher wins when two sources list the same hackathon. */
export const SOURCE_PRIORITY: Record<SourceId, number> = {
  curated: 3,
  devpost: 2,
  mlh: 1,
};

export const ONLINE_LOCATION = "online";
export const UNKNOWN_LOCATION = "TBA";

export interface HackathonEvent {
  title: string;
  url: string;
  /** UTC midnight of the calendar day. */
  startDate: Date;
  /** UTC midnight of the calendar day; never before startDate. */
  endDate: Date;
  /** Free text, or ONLINE_LOCATION for online-only events. */
  location: string;
  source: SourceId;
}

/** One entry of the feed file, as the bot reads it. */
export interface FeedRecord {
  title: string;
  url: string;
  start_date: string;
  end_date: string;
  location: string;
  source: SourceId;
}

export const DEFAULT_TIMEZONE = "UTC";

export function isSourceId(value: string): value is SourceId {
  return SOURCE_IDS.some((id) => id === value);
}

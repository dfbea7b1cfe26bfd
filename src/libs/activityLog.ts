import type { ActivityEvent, ActivityType } from "../types/ActivityEvent";
import { appendActivityEvent } from "../utils/activityPersistence";
import { issueId } from "../utils/idUtil";
import { getIsoTime } from "../utils/timeUtil";

const MAX_EVENTS = 500;

export class ActivityLog {
  private readonly events: ActivityEvent[] = [];
  private pending: Promise<void> = Promise.resolve();

  /** @param filePath NDJSON file to append to; in-memory only when omitted. */
  constructor(private readonly filePath?: string) {}

  record(type: ActivityType, action: string, detail?: string): ActivityEvent {
    const event: ActivityEvent = {
      id: issueId("evt"),
      timestamp: getIsoTime(),
      type,
      action,
      detail,
    };
    this.events.push(event);
    if (this.events.length > MAX_EVENTS) {
      this.events.splice(0, this.events.length - MAX_EVENTS);
    }
    const filePath = this.filePath;
    if (filePath) {
      this.pending = this.pending.then(() => appendActivityEvent(filePath, event));
    }
    return event;
  }

  tail(limit = 50): ActivityEvent[] {
    return this.events.slice(Math.max(0, this.events.length - limit));
  }

  /** Resolves once every append issued so far has been attempted. */
  flush(): Promise<void> {
    return this.pending;
  }
}

import type { Activity, ActivityMap, DirectoryError, DirectoryResult } from './types.js';

function fail(kind: DirectoryError['kind'], detail: string): DirectoryResult {
  return { ok: false, error: { kind, detail } };
}

function snapshot(activity: Activity): Activity {
  return { ...activity, participants: [...activity.participants] };
}

/**
 * In-memory roster of every activity. Built once per process and handed to
 * the HTTP layer; all operations are synchronous, so a request's
 * read-modify-write finishes before the next request touches the roster.
 */
export class ActivityDirectory {
  private readonly activities = new Map<string, Activity>();
  // email → name of the activity it is registered in
  private readonly enrolment = new Map<string, string>();

  constructor(seed: ActivityMap) {
    for (const [name, activity] of Object.entries(seed)) {
      const participants: string[] = [];
      for (const email of activity.participants) {
        const existing = this.enrolment.get(email);
        if (existing !== undefined) {
          throw new Error(`seed lists ${email} in both "${existing}" and "${name}"`);
        }
        this.enrolment.set(email, name);
        participants.push(email);
      }
      this.activities.set(name, { ...activity, participants });
    }
  }

  list(): ActivityMap {
    const result: ActivityMap = {};
    for (const [name, activity] of this.activities) {
      result[name] = snapshot(activity);
    }
    return result;
  }

  get(name: string): Activity | undefined {
    const activity = this.activities.get(name);
    return activity ? snapshot(activity) : undefined;
  }

  /** Capacity is advisory: a full activity still accepts signups, so this can go negative. */
  spotsLeft(name: string): number | undefined {
    const activity = this.activities.get(name);
    if (!activity) return undefined;
    return activity.max_participants - activity.participants.length;
  }

  /** Activity the email is currently registered in, if any. */
  enrolledIn(email: string): string | undefined {
    return this.enrolment.get(email);
  }

  participantCount(): number {
    return this.enrolment.size;
  }

  signup(name: string, email: string): DirectoryResult {
    const activity = this.activities.get(name);
    if (!activity) {
      return fail('not_found', 'Activity not found');
    }
    if (activity.participants.includes(email)) {
      return fail('conflict', 'Student is already signed up for this activity');
    }
    const other = this.enrolment.get(email);
    if (other !== undefined) {
      return fail('conflict', `Student is already signed up for ${other}`);
    }

    activity.participants.push(email);
    this.enrolment.set(email, name);
    return { ok: true, message: `Signed up ${email} for ${name}` };
  }

  unregister(name: string, email: string): DirectoryResult {
    const activity = this.activities.get(name);
    if (!activity) {
      return fail('not_found', 'Activity not found');
    }
    const idx = activity.participants.indexOf(email);
    if (idx === -1) {
      return fail('bad_request', 'Student is not registered for this activity');
    }

    activity.participants.splice(idx, 1);
    this.enrolment.delete(email);
    return { ok: true, message: `Unregistered ${email} from ${name}` };
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import { ACTIVITY_SEED } from './activity-seed';
import { Activity, ActivityMap, ParticipantResult } from './activity.types';
import {
  ActivityNotFoundException,
  AlreadyRegisteredException,
  CapacityExceededException,
  NotRegisteredException,
} from './activities.errors';

/**
 * In-memory activity registry.
 *
 * The set of activities is fixed at construction; only participant lists
 * change. Each activity has its own lock so the check-then-write in
 * enroll/withdraw never interleaves with another mutation of the same activity.
 */
@Injectable()
export class ActivitiesService {
  private readonly log = new Logger(ActivitiesService.name);
  private readonly activities = new Map<string, Activity>();
  private readonly locks = new Map<string, Mutex>();

  constructor(@Inject(ACTIVITY_SEED) seed: ActivityMap) {
    for (const [name, a] of Object.entries(seed)) {
      this.activities.set(name, { ...a, participants: [...a.participants] });
      this.locks.set(name, new Mutex());
    }
    this.log.log(`Registry ready with ${this.activities.size} activities`);
  }

  /** Copy of every activity, participants included. */
  list(): ActivityMap {
    const out: ActivityMap = {};
    for (const [name, a] of this.activities) {
      out[name] = { ...a, participants: [...a.participants] };
    }
    return out;
  }

  async enroll(activityName: string, email: string): Promise<ParticipantResult> {
    return this.withActivity(activityName, (activity) => {
      if (activity.participants.includes(email)) {
        this.log.warn(`Duplicate signup for ${activityName}: ${email}`);
        throw new AlreadyRegisteredException(activityName, email);
      }
      if (activity.participants.length >= activity.max_participants) {
        this.log.warn(`${activityName} is full, rejected ${email}`);
        throw new CapacityExceededException();
      }

      activity.participants.push(email);
      this.log.log(`${email} joined ${activityName} (${activity.participants.length}/${activity.max_participants})`);
      return { message: `${email} signed up for ${activityName}` };
    });
  }

  async withdraw(activityName: string, email: string): Promise<ParticipantResult> {
    return this.withActivity(activityName, (activity) => {
      const idx = activity.participants.indexOf(email);
      if (idx === -1) {
        this.log.warn(`Unregister for ${activityName} without signup: ${email}`);
        throw new NotRegisteredException(activityName, email);
      }

      activity.participants.splice(idx, 1);
      this.log.log(`${email} left ${activityName}`);
      return { message: `${email} unregistered from ${activityName}` };
    });
  }

  private async withActivity<T>(activityName: string, fn: (activity: Activity) => T): Promise<T> {
    const activity = this.activities.get(activityName);
    const lock = this.locks.get(activityName);
    if (!activity || !lock) {
      this.log.warn(`Unknown activity: ${activityName}`);
      throw new ActivityNotFoundException();
    }
    return lock.runExclusive(() => fn(activity));
  }
}

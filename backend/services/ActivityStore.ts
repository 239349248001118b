import {
  ActivityCatalog,
  ActivityRecord,
  ActivitySeedEntry,
  ActivitySnapshot,
  ActivitySnapshotMap,
  toSnapshot
} from '../models/Activity';
import { CatalogError } from '../utils/EnrollmentErrorHandler';

export type EnrollFailure = 'NOT_FOUND' | 'ALREADY_ENROLLED' | 'FULL';
export type WithdrawFailure = 'NOT_FOUND' | 'NOT_ENROLLED';
export type RosterFailure = EnrollFailure | WithdrawFailure;

export interface RosterConfirmation {
  activityName: string;
  participantId: string;
}

export type RosterOutcome<F extends RosterFailure> =
  | ({ success: true } & RosterConfirmation)
  | { success: false; error: F; activityName: string; participantId: string };

export type EnrollOutcome = RosterOutcome<EnrollFailure>;
export type WithdrawOutcome = RosterOutcome<WithdrawFailure>;

/**
 * ActivityStore - authoritative in-memory roster registry
 *
 * Every operation is synchronous, so each check-then-mutate completes before
 * any other request handler gets to run and no caller sees a half-applied roster.
 */
export class ActivityStore {
  private readonly activities = new Map<string, ActivityRecord>();

  constructor(catalog: ActivityCatalog) {
    for (const [name, entry] of Object.entries(catalog)) {
      this.activities.set(name, ActivityStore.toRecord(name, entry));
    }
  }

  /**
   * Snapshot of every activity, in catalog order
   */
  public list(): ActivitySnapshotMap {
    return Object.fromEntries(
      Array.from(this.activities, ([name, record]): [string, ActivitySnapshot] => [name, toSnapshot(record)])
    );
  }

  public get(activityName: string): ActivitySnapshot | undefined {
    const record = this.activities.get(activityName);
    return record ? toSnapshot(record) : undefined;
  }

  /**
   * Add a participant to an activity roster.
   * Checks run in order: activity exists, not already enrolled, capacity left.
   */
  public enroll(activityName: string, participantId: string): EnrollOutcome {
    const record = this.activities.get(activityName);
    if (!record) {
      return { success: false, error: 'NOT_FOUND', activityName, participantId };
    }

    if (record.roster.includes(participantId)) {
      return { success: false, error: 'ALREADY_ENROLLED', activityName, participantId };
    }

    if (record.roster.length >= record.capacity) {
      return { success: false, error: 'FULL', activityName, participantId };
    }

    record.roster.push(participantId);
    return { success: true, activityName, participantId };
  }

  /**
   * Remove a participant from an activity roster.
   */
  public withdraw(activityName: string, participantId: string): WithdrawOutcome {
    const record = this.activities.get(activityName);
    if (!record) {
      return { success: false, error: 'NOT_FOUND', activityName, participantId };
    }

    const index = record.roster.indexOf(participantId);
    if (index === -1) {
      return { success: false, error: 'NOT_ENROLLED', activityName, participantId };
    }

    record.roster.splice(index, 1);
    return { success: true, activityName, participantId };
  }

  private static toRecord(name: string, entry: ActivitySeedEntry): ActivityRecord {
    const capacity = entry.max_participants;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new CatalogError(`Activity "${name}" must have a positive integer capacity`, name);
    }

    const roster: string[] = [];
    for (const participantId of entry.participants) {
      if (roster.includes(participantId)) {
        throw new CatalogError(`Activity "${name}" lists ${participantId} more than once`, name);
      }
      roster.push(participantId);
    }

    if (roster.length > capacity) {
      throw new CatalogError(
        `Activity "${name}" has ${roster.length} participants but capacity ${capacity}`,
        name
      );
    }

    return {
      name,
      description: entry.description,
      schedule: entry.schedule,
      capacity,
      roster
    };
  }
}

export default ActivityStore;

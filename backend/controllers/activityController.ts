import { Request, Response, NextFunction, RequestHandler } from 'express';
import ActivityStore from '../services/ActivityStore';
import { availableSpots } from '../models/Activity';
import EnrollmentErrorHandler, { EnrollmentErrorType } from '../utils/EnrollmentErrorHandler';
import RosterMonitor, { OperationType } from '../utils/RosterMonitor';

export interface ActivityController {
  getActivities: RequestHandler;
  getActivity: RequestHandler;
  signupForActivity: RequestHandler;
  unregisterFromActivity: RequestHandler;
}

/**
 * Email query parameter, if present and not blank. Format is not checked.
 */
const readEmailQuery = (req: Request): string | undefined => {
  const email = req.query.email;
  return typeof email === 'string' && email.trim() !== '' ? email : undefined;
};

/**
 * Build the request handlers for the activity routes around one store
 */
export const createActivityController = (store: ActivityStore): ActivityController => {
  const errorHandler = EnrollmentErrorHandler.getInstance();
  const monitor = RosterMonitor.getInstance();

  const missingEmail = (req: Request, activityName: string) =>
    errorHandler.createError(
      EnrollmentErrorType.VALIDATION_FAILED,
      'Query parameter "email" is required',
      req,
      422,
      { activityName }
    );

  const spotsLeft = (activityName: string): number | undefined => {
    const activity = store.get(activityName);
    return activity ? availableSpots(activity) : undefined;
  };

  /**
   * GET /activities
   */
  const getActivities = (req: Request, res: Response): void => {
    const activities = store.list();

    monitor.logOperation(OperationType.ACTIVITY_LISTING, 'List activities', 'success', req, {
      activityCount: Object.keys(activities).length
    });

    res.json(activities);
  };

  /**
   * GET /activities/:activityName
   */
  const getActivity = (req: Request, res: Response, next: NextFunction): void => {
    const { activityName } = req.params;
    const activity = store.get(activityName);

    if (!activity) {
      next(errorHandler.fromRosterFailure('NOT_FOUND', { activityName }, req));
      return;
    }

    res.json(activity);
  };

  /**
   * POST /activities/:activityName/signup?email=
   */
  const signupForActivity = (req: Request, res: Response, next: NextFunction): void => {
    const { activityName } = req.params;
    const email = readEmailQuery(req);

    if (email === undefined) {
      next(missingEmail(req, activityName));
      return;
    }

    const outcome = store.enroll(activityName, email);

    if (!outcome.success) {
      monitor.logOperation(OperationType.ENROLLMENT, 'Sign up for activity', 'failure', req, {
        activityName,
        email,
        reason: outcome.error
      });
      next(errorHandler.fromRosterFailure(outcome.error, { activityName, email }, req));
      return;
    }

    monitor.logOperation(OperationType.ENROLLMENT, 'Sign up for activity', 'success', req, {
      activityName,
      email,
      spotsLeft: spotsLeft(activityName)
    });

    res.json({ message: `Signed up ${outcome.participantId} for ${outcome.activityName}` });
  };

  /**
   * DELETE /activities/:activityName/unregister?email=
   */
  const unregisterFromActivity = (req: Request, res: Response, next: NextFunction): void => {
    const { activityName } = req.params;
    const email = readEmailQuery(req);

    if (email === undefined) {
      next(missingEmail(req, activityName));
      return;
    }

    const outcome = store.withdraw(activityName, email);

    if (!outcome.success) {
      monitor.logOperation(OperationType.WITHDRAWAL, 'Unregister from activity', 'failure', req, {
        activityName,
        email,
        reason: outcome.error
      });
      next(errorHandler.fromRosterFailure(outcome.error, { activityName, email }, req));
      return;
    }

    monitor.logOperation(OperationType.WITHDRAWAL, 'Unregister from activity', 'success', req, {
      activityName,
      email,
      spotsLeft: spotsLeft(activityName)
    });

    res.json({ message: `Unregistered ${outcome.participantId} from ${outcome.activityName}` });
  };

  return {
    getActivities,
    getActivity,
    signupForActivity,
    unregisterFromActivity
  };
};

export default createActivityController;

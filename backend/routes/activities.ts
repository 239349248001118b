import express, { Router } from 'express';
import ActivityStore from '../services/ActivityStore';
import { createActivityController } from '../controllers/activityController';
import {
  listingPerformanceMiddleware,
  enrollmentPerformanceMiddleware,
  withdrawalPerformanceMiddleware
} from '../middleware/performanceMiddleware';

/**
 * Activity routes, bound to the given store
 */
export const createActivityRouter = (store: ActivityStore): Router => {
  const router = express.Router();
  const controller = createActivityController(store);

  /**
   * GET /activities
   * Every activity with its current roster
   */
  router.get('/',
    listingPerformanceMiddleware('List Activities'),
    controller.getActivities
  );

  /**
   * GET /activities/:activityName
   * A single activity with its current roster
   */
  router.get('/:activityName',
    listingPerformanceMiddleware('Get Activity'),
    controller.getActivity
  );

  /**
   * POST /activities/:activityName/signup?email=
   * Add a student to the activity roster
   */
  router.post('/:activityName/signup',
    enrollmentPerformanceMiddleware('Sign Up'),
    controller.signupForActivity
  );

  /**
   * DELETE /activities/:activityName/unregister?email=
   * Remove a student from the activity roster
   */
  router.delete('/:activityName/unregister',
    withdrawalPerformanceMiddleware('Unregister'),
    controller.unregisterFromActivity
  );

  return router;
};

export default createActivityRouter;

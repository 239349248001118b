import { Request, Response, NextFunction, RequestHandler } from 'express';
import RosterMonitor, { OperationType } from '../utils/RosterMonitor';

const monitor = RosterMonitor.getInstance();

/**
 * Performance monitoring middleware: times the request and logs it once the connection is done with it.
 * 'close' fires for completed and aborted responses alike.
 */
export const performanceMiddleware = (operationType: OperationType, operationName: string): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();

    res.once('close', () => {
      const aborted = !res.writableFinished;

      monitor.logTimedOperation(
        OperationType.HTTP_REQUEST,
        operationName,
        aborted || res.statusCode >= 400 ? 'failure' : 'success',
        Date.now() - startTime,
        req,
        {
          operationType,
          method: req.method,
          path: req.originalUrl,
          statusCode: res.statusCode,
          aborted
        }
      );
    });

    next();
  };
};

/**
 * Listing performance middleware
 */
export const listingPerformanceMiddleware = (operationName: string): RequestHandler =>
  performanceMiddleware(OperationType.ACTIVITY_LISTING, operationName);

/**
 * Enrollment performance middleware
 */
export const enrollmentPerformanceMiddleware = (operationName: string): RequestHandler =>
  performanceMiddleware(OperationType.ENROLLMENT, operationName);

/**
 * Withdrawal performance middleware
 */
export const withdrawalPerformanceMiddleware = (operationName: string): RequestHandler =>
  performanceMiddleware(OperationType.WITHDRAWAL, operationName);

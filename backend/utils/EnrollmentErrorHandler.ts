import { Request, Response, NextFunction } from 'express';
import { RosterFailure } from '../services/ActivityStore';
import { LogLevel, parseLogLevel } from '../config/server';

/**
 * Enrollment error types surfaced at the HTTP boundary
 */
export enum EnrollmentErrorType {
  ACTIVITY_NOT_FOUND = 'ACTIVITY_NOT_FOUND',
  ALREADY_ENROLLED = 'ALREADY_ENROLLED',
  NOT_ENROLLED = 'NOT_ENROLLED',
  ACTIVITY_FULL = 'ACTIVITY_FULL',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  ROUTE_NOT_FOUND = 'ROUTE_NOT_FOUND',
  INVALID_CATALOG = 'INVALID_CATALOG',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

export interface EnrollmentErrorContext {
  activityName?: string;
  email?: string;
  userFriendlyMessage?: string;
  suggestedActions?: string[];
  requestId?: string;
}

export interface EnrollmentErrorBody {
  detail: string;
  error: {
    type: EnrollmentErrorType;
    message: string;
    userFriendlyMessage: string;
    suggestedActions: string[];
    timestamp: string;
    requestId?: string;
  };
  context: {
    activityName?: string;
    email?: string;
  };
}

const USER_MESSAGES: Record<EnrollmentErrorType, string> = {
  [EnrollmentErrorType.ACTIVITY_NOT_FOUND]:
    'The requested activity could not be found.',
  [EnrollmentErrorType.ALREADY_ENROLLED]:
    'This student is already on the activity roster.',
  [EnrollmentErrorType.NOT_ENROLLED]:
    'This student is not on the activity roster.',
  [EnrollmentErrorType.ACTIVITY_FULL]:
    'This activity has no spots left.',
  [EnrollmentErrorType.VALIDATION_FAILED]:
    'The request is missing required information.',
  [EnrollmentErrorType.ROUTE_NOT_FOUND]:
    'The requested page does not exist.',
  [EnrollmentErrorType.INVALID_CATALOG]:
    'The activity catalog could not be loaded.',
  [EnrollmentErrorType.INTERNAL_ERROR]:
    'We\'re experiencing technical difficulties. Please try again later.'
};

const SUGGESTED_ACTIONS: Record<EnrollmentErrorType, string[]> = {
  [EnrollmentErrorType.ACTIVITY_NOT_FOUND]: [
    'Check the activity name, including capitalization and spacing',
    'Reload the activity list'
  ],
  [EnrollmentErrorType.ALREADY_ENROLLED]: [
    'No action needed, the student is already signed up'
  ],
  [EnrollmentErrorType.NOT_ENROLLED]: [
    'Verify the student email address',
    'Reload the activity list'
  ],
  [EnrollmentErrorType.ACTIVITY_FULL]: [
    'Choose another activity',
    'Try again after a participant unregisters'
  ],
  [EnrollmentErrorType.VALIDATION_FAILED]: [
    'Provide the student email address'
  ],
  [EnrollmentErrorType.ROUTE_NOT_FOUND]: [
    'Verify the URL'
  ],
  [EnrollmentErrorType.INVALID_CATALOG]: [
    'Fix the activity catalog file and restart the server'
  ],
  [EnrollmentErrorType.INTERNAL_ERROR]: [
    'Try refreshing the page',
    'Contact support if the problem persists'
  ]
};

/**
 * Enrollment error with the context needed to build the HTTP response
 */
export class EnrollmentError extends Error {
  public readonly type: EnrollmentErrorType;
  public readonly statusCode: number;
  public readonly activityName?: string;
  public readonly email?: string;
  public readonly userFriendlyMessage: string;
  public readonly suggestedActions: string[];
  public readonly timestamp: Date;
  public readonly requestId?: string;

  constructor(
    type: EnrollmentErrorType,
    message: string,
    statusCode: number = 400,
    context?: EnrollmentErrorContext
  ) {
    super(message);
    this.name = 'EnrollmentError';
    this.type = type;
    this.statusCode = statusCode;
    this.activityName = context?.activityName;
    this.email = context?.email;
    this.userFriendlyMessage = context?.userFriendlyMessage || USER_MESSAGES[type];
    this.suggestedActions = context?.suggestedActions || SUGGESTED_ACTIONS[type];
    this.timestamp = new Date();
    this.requestId = context?.requestId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EnrollmentError);
    }
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): EnrollmentErrorBody {
    return {
      detail: this.message,
      error: {
        type: this.type,
        message: this.message,
        userFriendlyMessage: this.userFriendlyMessage,
        suggestedActions: this.suggestedActions,
        timestamp: this.timestamp.toISOString(),
        requestId: this.requestId
      },
      context: {
        activityName: this.activityName,
        email: this.email
      }
    };
  }
}

/**
 * Raised while seeding the store from an invalid catalog
 */
export class CatalogError extends Error {
  public readonly type = EnrollmentErrorType.INVALID_CATALOG;
  public readonly activityName?: string;

  constructor(message: string, activityName?: string) {
    super(message);
    this.name = 'CatalogError';
    this.activityName = activityName;
  }
}

const ROSTER_FAILURES: Record<RosterFailure, { type: EnrollmentErrorType; statusCode: number; message: string }> = {
  NOT_FOUND: {
    type: EnrollmentErrorType.ACTIVITY_NOT_FOUND,
    statusCode: 404,
    message: 'Activity not found'
  },
  ALREADY_ENROLLED: {
    type: EnrollmentErrorType.ALREADY_ENROLLED,
    statusCode: 400,
    message: 'Student is already signed up'
  },
  FULL: {
    type: EnrollmentErrorType.ACTIVITY_FULL,
    statusCode: 409,
    message: 'Activity is full'
  },
  NOT_ENROLLED: {
    type: EnrollmentErrorType.NOT_ENROLLED,
    statusCode: 400,
    message: 'Student is not signed up for this activity'
  }
};

interface ErrorLogEntry {
  error: EnrollmentError;
  request: {
    method?: string;
    url?: string;
  };
  timestamp: Date;
}

const MAX_ERROR_LOG = 1000;

/**
 * Enrollment error handler utility class
 */
export class EnrollmentErrorHandler {
  private static instance: EnrollmentErrorHandler;
  private errorLog: ErrorLogEntry[] = [];
  private logLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

  private constructor() {}

  public static getInstance(): EnrollmentErrorHandler {
    if (!EnrollmentErrorHandler.instance) {
      EnrollmentErrorHandler.instance = new EnrollmentErrorHandler();
    }
    return EnrollmentErrorHandler.instance;
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Create an enrollment error tagged with a request id, and log it
   */
  public createError(
    type: EnrollmentErrorType,
    message: string,
    req?: Request,
    statusCode?: number,
    context?: EnrollmentErrorContext
  ): EnrollmentError {
    const error = new EnrollmentError(type, message, statusCode, {
      requestId: this.getRequestId(req),
      ...context
    });

    this.logError(error, req);

    return error;
  }

  /**
   * Translate a failed roster operation into its HTTP error
   */
  public fromRosterFailure(
    failure: RosterFailure,
    context: { activityName: string; email?: string },
    req?: Request
  ): EnrollmentError {
    const mapping = ROSTER_FAILURES[failure];
    return this.createError(mapping.type, mapping.message, req, mapping.statusCode, context);
  }

  /**
   * Express error handling middleware
   */
  public errorMiddleware = (
    error: Error,
    req: Request,
    res: Response,
    next: NextFunction
  ): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof EnrollmentError) {
      res.status(error.statusCode).json(error.toJSON());
      return;
    }

    if (this.logLevel !== 'silent') {
      console.error('🚨 Roster system error:', {
        message: error.message,
        stack: error.stack,
        url: req.url,
        method: req.method,
        timestamp: new Date().toISOString()
      });
    }

    const enrollmentError = this.createError(
      EnrollmentErrorType.INTERNAL_ERROR,
      'An error occurred while processing your request',
      req,
      500
    );

    res.status(enrollmentError.statusCode).json(enrollmentError.toJSON());
  };

  /**
   * Fallback for requests no route matched
   */
  public notFoundMiddleware = (req: Request, res: Response): void => {
    const error = this.createError(
      EnrollmentErrorType.ROUTE_NOT_FOUND,
      'Route not found',
      req,
      404
    );
    res.status(error.statusCode).json(error.toJSON());
  };

  /**
   * Get error statistics for monitoring
   */
  public getErrorStatistics(hours: number = 24): {
    total: number;
    byType: Record<string, number>;
    byStatusCode: Record<string, number>;
    recentErrors: Array<{ type: EnrollmentErrorType; message: string; activityName?: string; timestamp: Date }>;
  } {
    const cutoffTime = new Date(Date.now() - hours * 60 * 60 * 1000);
    const filteredErrors = this.errorLog.filter(entry => entry.timestamp >= cutoffTime);

    const byType: Record<string, number> = {};
    const byStatusCode: Record<string, number> = {};

    filteredErrors.forEach(entry => {
      byType[entry.error.type] = (byType[entry.error.type] || 0) + 1;
      const status = entry.error.statusCode.toString();
      byStatusCode[status] = (byStatusCode[status] || 0) + 1;
    });

    return {
      total: filteredErrors.length,
      byType,
      byStatusCode,
      recentErrors: filteredErrors.slice(-10).map(entry => ({
        type: entry.error.type,
        message: entry.error.message,
        activityName: entry.error.activityName,
        timestamp: entry.error.timestamp
      }))
    };
  }

  /**
   * Clear error log (for testing or maintenance)
   */
  public clearErrorLog(): void {
    this.errorLog = [];
  }

  private logError(error: EnrollmentError, req?: Request): void {
    this.errorLog.push({
      error,
      request: req ? { method: req.method, url: req.originalUrl } : {},
      timestamp: new Date()
    });

    if (this.errorLog.length > MAX_ERROR_LOG) {
      this.errorLog = this.errorLog.slice(-MAX_ERROR_LOG);
    }

    if (this.logLevel === 'silent') return;

    console.error('🚨 ENROLLMENT ERROR:', {
      type: error.type,
      message: error.message,
      activityName: error.activityName,
      email: error.email,
      statusCode: error.statusCode,
      timestamp: error.timestamp.toISOString(),
      requestId: error.requestId,
      url: req?.originalUrl,
      method: req?.method
    });
  }

  private getRequestId(req?: Request): string {
    const header = req?.headers['x-request-id'];
    if (typeof header === 'string' && header.length > 0) {
      return header;
    }
    return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }
}

export default EnrollmentErrorHandler;

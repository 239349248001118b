import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import express from 'express';
import { createApp } from '../app';
import ActivityStore from '../services/ActivityStore';
import { getServerConfig } from '../config/server';
import { ActivityCatalog } from '../models/Activity';
import EnrollmentErrorHandler, { EnrollmentErrorType } from '../utils/EnrollmentErrorHandler';
import RosterMonitor, { OperationType } from '../utils/RosterMonitor';

const seedCatalog = (): ActivityCatalog => ({
  'Chess Club': {
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    max_participants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu']
  },
  'Programming Class': {
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    max_participants: 20,
    participants: ['emma@mergington.edu', 'sophia@mergington.edu']
  },
  'Small Club': {
    description: 'A small test club',
    schedule: 'Mondays',
    max_participants: 3,
    participants: ['student1@mergington.edu']
  }
});

/**
 * Integration tests for the activity HTTP API
 * Each test gets a freshly seeded store and app
 */
describe('Activities API', () => {
  let store: ActivityStore;
  let app: express.Application;

  beforeEach(() => {
    EnrollmentErrorHandler.getInstance().clearErrorLog();
    RosterMonitor.getInstance().clearAll();

    store = new ActivityStore(seedCatalog());
    app = createApp({ store, config: getServerConfig({ RATE_LIMIT_MAX: '1000', LOG_LEVEL: 'silent' }) });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('GET /', () => {
    it('should redirect to the static index page', async () => {
      const response = await request(app).get('/').redirects(0);

      expect(response.status).toBe(307);
      expect(response.headers.location).toBe('/static/index.html');
    });

    it('should serve the static index page', async () => {
      const response = await request(app).get('/static/index.html');

      expect(response.status).toBe(200);
      expect(response.text).toContain('<title>Extracurricular Activities</title>');
    });
  });

  describe('GET /activities', () => {
    it('should return every activity keyed by name', async () => {
      const response = await request(app).get('/activities').expect(200);

      expect(Object.keys(response.body)).toEqual(['Chess Club', 'Programming Class', 'Small Club']);
      expect(response.body['Chess Club'].participants).toHaveLength(2);
      expect(response.body['Chess Club'].max_participants).toBe(12);
      expect(response.body['Chess Club'].schedule).toBe('Fridays, 3:30 PM - 5:00 PM');
    });

    it('should log the listing', async () => {
      await request(app).get('/activities').expect(200);

      const stats = RosterMonitor.getInstance().getStatistics();
      expect(stats.eventsByType[OperationType.ACTIVITY_LISTING]).toBe(1);
    });
  });

  describe('GET /activities/:activityName', () => {
    it('should return a single activity', async () => {
      const response = await request(app).get('/activities/Small%20Club').expect(200);

      expect(response.body).toEqual({
        description: 'A small test club',
        schedule: 'Mondays',
        max_participants: 3,
        participants: ['student1@mergington.edu']
      });
    });

    it('should return 404 for an unknown activity', async () => {
      const response = await request(app).get('/activities/Ghost%20Club').expect(404);

      expect(response.body.detail).toBe('Activity not found');
      expect(response.body.context.activityName).toBe('Ghost Club');
    });
  });

  describe('POST /activities/:activityName/signup', () => {
    it('should sign up a new student', async () => {
      const response = await request(app)
        .post('/activities/Chess%20Club/signup')
        .query({ email: 'newstudent@mergington.edu' })
        .expect(200);

      expect(response.body).toEqual({ message: 'Signed up newstudent@mergington.edu for Chess Club' });

      const activities = await request(app).get('/activities');
      expect(activities.body['Chess Club'].participants).toContain('newstudent@mergington.edu');
    });

    it('should reject a student who is already signed up', async () => {
      const response = await request(app)
        .post('/activities/Chess%20Club/signup')
        .query({ email: 'michael@mergington.edu' })
        .expect(400);

      expect(response.body.detail).toBe('Student is already signed up');
      expect(response.body.error.type).toBe(EnrollmentErrorType.ALREADY_ENROLLED);
      expect(response.body.context).toEqual({
        activityName: 'Chess Club',
        email: 'michael@mergington.edu'
      });
    });

    it('should return 404 for a nonexistent activity', async () => {
      const response = await request(app)
        .post('/activities/Nonexistent%20Club/signup')
        .query({ email: 'student@mergington.edu' })
        .expect(404);

      expect(response.body.detail).toBe('Activity not found');
      expect(response.body.error.type).toBe(EnrollmentErrorType.ACTIVITY_NOT_FOUND);
    });

    it('should accept sign ups until the activity is full', async () => {
      await request(app)
        .post('/activities/Small%20Club/signup')
        .query({ email: 'student2@mergington.edu' })
        .expect(200);
      await request(app)
        .post('/activities/Small%20Club/signup')
        .query({ email: 'student3@mergington.edu' })
        .expect(200);

      const activities = await request(app).get('/activities');
      expect(activities.body['Small Club'].participants).toHaveLength(3);
    });

    it('should return 409 once the activity is full', async () => {
      await request(app).post('/activities/Small%20Club/signup').query({ email: 'student2@mergington.edu' });
      await request(app).post('/activities/Small%20Club/signup').query({ email: 'student3@mergington.edu' });

      const response = await request(app)
        .post('/activities/Small%20Club/signup')
        .query({ email: 'student4@mergington.edu' })
        .expect(409);

      expect(response.body.detail).toBe('Activity is full');
      expect(response.body.error.type).toBe(EnrollmentErrorType.ACTIVITY_FULL);
      expect(store.get('Small Club')?.participants).toHaveLength(3);
    });

    it('should require the email query parameter', async () => {
      const response = await request(app)
        .post('/activities/Chess%20Club/signup')
        .expect(422);

      expect(response.body.detail).toBe('Query parameter "email" is required');
      expect(response.body.error.type).toBe(EnrollmentErrorType.VALIDATION_FAILED);
    });

    it('should read the email from the query string only', async () => {
      await request(app)
        .post('/activities/Chess%20Club/signup')
        .send({ email: 'body@mergington.edu' })
        .expect(422);

      expect(store.get('Chess Club')?.participants).toHaveLength(2);
    });

    it('should reject a blank email', async () => {
      await request(app)
        .post('/activities/Chess%20Club/signup')
        .query({ email: '   ' })
        .expect(422);

      expect(store.get('Chess Club')?.participants).toHaveLength(2);
    });

    it('should log failed sign ups', async () => {
      await request(app)
        .post('/activities/Chess%20Club/signup')
        .query({ email: 'michael@mergington.edu' })
        .expect(400);

      const monitorStats = RosterMonitor.getInstance().getStatistics('Chess Club');
      expect(monitorStats.eventsByType[OperationType.ENROLLMENT]).toBe(1);
      expect(monitorStats.eventsByResult.failure).toBe(1);

      const errorStats = EnrollmentErrorHandler.getInstance().getErrorStatistics();
      expect(errorStats.byType[EnrollmentErrorType.ALREADY_ENROLLED]).toBe(1);
      expect(errorStats.byStatusCode['400']).toBe(1);
    });
  });

  describe('DELETE /activities/:activityName/unregister', () => {
    it('should unregister a signed up student', async () => {
      const response = await request(app)
        .delete('/activities/Chess%20Club/unregister')
        .query({ email: 'michael@mergington.edu' })
        .expect(200);

      expect(response.body).toEqual({ message: 'Unregistered michael@mergington.edu from Chess Club' });

      const activities = await request(app).get('/activities');
      expect(activities.body['Chess Club'].participants).not.toContain('michael@mergington.edu');
    });

    it('should reject a student who is not signed up', async () => {
      const response = await request(app)
        .delete('/activities/Chess%20Club/unregister')
        .query({ email: 'notsignedup@mergington.edu' })
        .expect(400);

      expect(response.body.detail).toBe('Student is not signed up for this activity');
      expect(response.body.error.type).toBe(EnrollmentErrorType.NOT_ENROLLED);
    });

    it('should return 404 for a nonexistent activity', async () => {
      const response = await request(app)
        .delete('/activities/Nonexistent%20Club/unregister')
        .query({ email: 'student@mergington.edu' })
        .expect(404);

      expect(response.body.detail).toBe('Activity not found');
    });

    it('should require the email query parameter', async () => {
      await request(app)
        .delete('/activities/Chess%20Club/unregister')
        .expect(422);

      expect(store.get('Chess Club')?.participants).toHaveLength(2);
    });
  });

  describe('error handling', () => {
    it('should answer unknown routes with 404', async () => {
      const response = await request(app).get('/courses').expect(404);

      expect(response.body.detail).toBe('Route not found');
      expect(response.body.error.type).toBe(EnrollmentErrorType.ROUTE_NOT_FOUND);
    });

    it('should answer unexpected failures with 500', async () => {
      vi.spyOn(store, 'list').mockImplementation(() => {
        throw new Error('boom');
      });

      const response = await request(app).get('/activities').expect(500);

      expect(response.body.detail).toBe('An error occurred while processing your request');
      expect(response.body.error.type).toBe(EnrollmentErrorType.INTERNAL_ERROR);
    });

    it('should echo the x-request-id header in error bodies', async () => {
      const response = await request(app)
        .post('/activities/Ghost%20Club/signup')
        .set('x-request-id', 'test-request-1')
        .query({ email: 'student@mergington.edu' })
        .expect(404);

      expect(response.body.error.requestId).toBe('test-request-1');
    });
  });

  describe('logging', () => {
    it('should keep the console quiet when configured silent', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      await request(app)
        .post('/activities/Chess%20Club/signup')
        .query({ email: 'michael@mergington.edu' })
        .expect(400);

      expect(log).not.toHaveBeenCalled();
      expect(error).not.toHaveBeenCalled();
    });

    it('should log to the console when configured at the info level', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const loudApp = createApp({ store, config: getServerConfig({ RATE_LIMIT_MAX: '1000', LOG_LEVEL: 'info' }) });

      await request(loudApp)
        .post('/activities/Chess%20Club/signup')
        .query({ email: 'michael@mergington.edu' })
        .expect(400);

      expect(log).toHaveBeenCalledWith('❌ [MEDIUM] ENROLLMENT: Sign up for activity');
      expect(error).toHaveBeenCalledWith('🚨 ENROLLMENT ERROR:', expect.objectContaining({
        type: EnrollmentErrorType.ALREADY_ENROLLED,
        statusCode: 400
      }));
    });
  });

  describe('rate limiting', () => {
    it('should reject requests over the configured limit', async () => {
      const limitedApp = createApp({ store, config: getServerConfig({ RATE_LIMIT_MAX: '2', LOG_LEVEL: 'silent' }) });

      await request(limitedApp).get('/activities').expect(200);
      await request(limitedApp).get('/activities').expect(200);
      const response = await request(limitedApp).get('/activities').expect(429);

      expect(response.text).toBe('Too many requests from this IP, please try again later.');
    });
  });
});

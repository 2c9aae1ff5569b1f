import type { Server } from 'http';
import nock from 'nock';
import request from 'supertest';
import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import container from '../main/config/container';
import { baseUrl, getApp, shutdownApp } from './utils/testApp';
import { mockBackend } from './utils/backends/backendMocks';
import { createTestMember } from './utils/organization/organizationTestUtils';
import { bearer, createTestAccount, type TestAccount } from './utils/users/userTestUtils';

describe('Proxied backend routes', function () {
  let app: Server;
  let admin: TestAccount;
  let manager: TestAccount;
  let member: TestAccount;

  beforeAll(async function () {
    app = await getApp();
    admin = await createTestAccount();
    manager = await createTestMember(admin.organization.id, 'manager');
    member = await createTestMember(admin.organization.id, 'member');
  });

  afterEach(function () {
    nock.cleanAll();
  });

  afterAll(async function () {
    await shutdownApp();
  });

  describe('GET /projects', function () {
    it('forwards the caller identity with a service credential', async function () {
      const credentialService = container.resolve('credentialService');
      const scope = mockBackend('projects')
        .get('/api/v1/projects')
        .matchHeader('x-service-name', 'gateway')
        .matchHeader('x-user-id', member.user.id)
        .matchHeader('x-organization-id', admin.organization.id)
        .matchHeader('x-user-role', 'member')
        .matchHeader('x-service-token', value => {
          const claims = credentialService.verifyServiceCredential(value, 'projects');
          return claims.principal?.userId === member.user.id;
        })
        .reply(200, []);

      const response = await request(app).get(`${baseUrl}/projects`).set('Authorization', bearer(member.token));

      expect(response.status).toBe(200);
      expect(scope.isDone()).toBe(true);
    });

    it('drops records of other organizations', async function () {
      mockBackend('projects')
        .get('/api/v1/projects')
        .reply(200, [
          { id: 1, name: 'Mine', organization_id: admin.organization.id },
          { id: 2, name: 'Theirs', organization_id: 'another-organization' },
          { id: 3, name: 'Unmarked' },
        ]);

      const response = await request(app).get(`${baseUrl}/projects`).set('Authorization', bearer(member.token));

      expect(response.status).toBe(200);
      expect(response.body).toEqual([
        { id: 1, name: 'Mine', organization_id: admin.organization.id },
        { id: 3, name: 'Unmarked' },
      ]);
    });

    it('passes the query string through', async function () {
      mockBackend('projects').get('/api/v1/projects').query({ status: 'active' }).reply(200, []);

      const response = await request(app)
        .get(`${baseUrl}/projects?status=active`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(200);
    });
  });

  describe('GET /projects/:projectId', function () {
    it('returns 404 for a project of another organization', async function () {
      mockBackend('projects').get('/api/v1/projects/7').reply(200, { id: 7, organizationId: 'another-organization' });

      const response = await request(app).get(`${baseUrl}/projects/7`).set('Authorization', bearer(member.token));

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Project not found', code: 'NotFound' });
    });

    it('passes backend errors through with their status and body', async function () {
      mockBackend('projects').get('/api/v1/projects/8').reply(404, { detail: 'Project 8 does not exist' });

      const response = await request(app).get(`${baseUrl}/projects/8`).set('Authorization', bearer(member.token));

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ detail: 'Project 8 does not exist' });
    });

    it('returns 502 when the backend rejects the service credential', async function () {
      mockBackend('projects').get('/api/v1/projects/9').reply(401, { detail: 'Invalid service token' });

      const response = await request(app).get(`${baseUrl}/projects/9`).set('Authorization', bearer(member.token));

      expect(response.status).toBe(502);
      expect(response.body).toEqual({
        error: 'projects rejected the gateway service credential',
        code: 'TrustRejected',
        service: 'projects',
      });
    });

    it('returns 502 when the backend cannot be reached', async function () {
      const response = await request(app).get(`${baseUrl}/projects/10`).set('Authorization', bearer(member.token));

      expect(response.status).toBe(502);
      expect(response.body.code).toBe('Unreachable');
    });
  });

  describe('POST /projects', function () {
    it('stamps the caller organization on the forwarded body', async function () {
      const orgId = admin.organization.id;
      const scope = mockBackend('projects')
        .post(
          '/api/v1/projects',
          (body: Record<string, unknown>) =>
            body.name === 'Telescope' && body.organization_id === orgId && body.organizationId === undefined
        )
        .reply(201, { id: 42, name: 'Telescope', organization_id: orgId });

      const response = await request(app)
        .post(`${baseUrl}/projects`)
        .set('Authorization', bearer(manager.token))
        .send({ name: 'Telescope', organizationId: 'another-organization' });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ id: 42, name: 'Telescope', organization_id: orgId });
      expect(scope.isDone()).toBe(true);
    });

    it('returns 403 for members', async function () {
      const response = await request(app)
        .post(`${baseUrl}/projects`)
        .set('Authorization', bearer(member.token))
        .send({ name: 'Telescope' });

      expect(response.status).toBe(403);
    });
  });

  describe('other resources', function () {
    it('routes team activity to the caller organization', async function () {
      mockBackend('activity')
        .get(`/api/v1/activity/team/${admin.organization.id}`)
        .reply(200, [{ user_id: manager.user.id, hours: 6 }]);

      const response = await request(app).get(`${baseUrl}/monitoring/team`).set('Authorization', bearer(manager.token));

      expect(response.status).toBe(200);
      expect(response.body).toEqual([{ user_id: manager.user.id, hours: 6 }]);
    });

    it('filters lists wrapped in items', async function () {
      mockBackend('labs')
        .get('/researchers')
        .reply(200, {
          items: [
            { id: 1, lab_id: 1, orchestrator_org_id: admin.organization.id },
            { id: 2, lab_id: 5, orchestrator_org_id: 'another-organization' },
          ],
          total: 2,
        });
      mockBackend('labs')
        .get('/labs')
        .reply(200, [{ id: 1, name: 'Optics', organization_id: admin.organization.id }]);

      const response = await request(app)
        .get(`${baseUrl}/research/researchers`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        items: [{ id: 1, lab_id: 1, orchestrator_org_id: admin.organization.id }],
        total: 2,
      });
    });
  });

  describe('GET /projects/:projectId/tasks', function () {
    it('returns 404 without asking for the tasks of a project of another organization', async function () {
      mockBackend('projects').get('/api/v1/projects/77').reply(200, { id: 77, organization_id: 'other-org' });
      const tasks = mockBackend('projects')
        .get('/api/v1/projects/77/tasks')
        .reply(200, [{ id: 5, title: 'secret', project_id: 77 }]);

      const response = await request(app)
        .get(`${baseUrl}/projects/77/tasks`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Project not found', code: 'NotFound' });
      expect(tasks.isDone()).toBe(false);
    });

    it('returns the tasks of a project of the caller organization', async function () {
      mockBackend('projects').get('/api/v1/projects/5').reply(200, { id: 5, organization_id: admin.organization.id });
      mockBackend('projects')
        .get('/api/v1/projects/5/tasks')
        .reply(200, [{ id: 11, title: 'Align mirrors', project_id: 5 }]);

      const response = await request(app).get(`${baseUrl}/projects/5/tasks`).set('Authorization', bearer(member.token));

      expect(response.status).toBe(200);
      expect(response.body).toEqual([{ id: 11, title: 'Align mirrors', project_id: 5 }]);
    });
  });

  describe('GET /projects/:projectId/issues', function () {
    it('returns the issues of a project of the caller organization', async function () {
      mockBackend('projects').get('/api/v1/projects/5').reply(200, { id: 5, organization_id: admin.organization.id });
      mockBackend('projects')
        .get('/api/v1/issues/project/5')
        .reply(200, [{ id: 3, title: 'Blurry images', project_id: 5 }]);

      const response = await request(app).get(`${baseUrl}/projects/5/issues`).set('Authorization', bearer(member.token));

      expect(response.status).toBe(200);
      expect(response.body).toEqual([{ id: 3, title: 'Blurry images', project_id: 5 }]);
    });

    it('returns 404 for a project of another organization', async function () {
      mockBackend('projects').get('/api/v1/projects/77').reply(200, { id: 77, organization_id: 'other-org' });

      const response = await request(app)
        .get(`${baseUrl}/projects/77/issues`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Project not found', code: 'NotFound' });
    });
  });

  describe('POST /projects/tasks', function () {
    it('creates a task in a project of the caller organization', async function () {
      const orgId = admin.organization.id;
      mockBackend('projects').get('/api/v1/projects/5').reply(200, { id: 5, organization_id: orgId });
      const scope = mockBackend('projects')
        .post(
          '/api/v1/internal/tasks',
          (body: Record<string, unknown>) =>
            body.title === 'Calibrate' && body.project_id === 5 && body.organization_id === orgId
        )
        .reply(201, { id: 12, title: 'Calibrate', project_id: 5 });

      const response = await request(app)
        .post(`${baseUrl}/projects/tasks`)
        .set('Authorization', bearer(member.token))
        .send({ title: 'Calibrate', project_id: 5, organization_id: 'other-org' });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ id: 12, title: 'Calibrate', project_id: 5 });
      expect(scope.isDone()).toBe(true);
    });

    it('returns 404 for a project of another organization', async function () {
      mockBackend('projects').get('/api/v1/projects/77').reply(200, { id: 77, organization_id: 'other-org' });
      const scope = mockBackend('projects').post('/api/v1/internal/tasks').reply(201, {});

      const response = await request(app)
        .post(`${baseUrl}/projects/tasks`)
        .set('Authorization', bearer(member.token))
        .send({ title: 'Calibrate', project_id: 77 });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Project not found', code: 'NotFound' });
      expect(scope.isDone()).toBe(false);
    });

    it('returns 400 when the task names no project', async function () {
      const response = await request(app)
        .post(`${baseUrl}/projects/tasks`)
        .set('Authorization', bearer(member.token))
        .send({ title: 'Calibrate' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'project_id is required', code: 'InvalidData' });
    });

    it('does not retry a task creation that failed to connect', async function () {
      mockBackend('projects').get('/api/v1/projects/5').reply(200, { id: 5, organization_id: admin.organization.id });
      const failed = mockBackend('projects')
        .post('/api/v1/internal/tasks')
        .replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' });
      const retried = mockBackend('projects').post('/api/v1/internal/tasks').reply(201, { id: 13 });

      const response = await request(app)
        .post(`${baseUrl}/projects/tasks`)
        .set('Authorization', bearer(member.token))
        .send({ title: 'Calibrate', project_id: 5 });

      expect(response.status).toBe(502);
      expect(response.body.code).toBe('Unreachable');
      expect(failed.isDone()).toBe(true);
      expect(retried.isDone()).toBe(false);
    });
  });

  describe('POST /monitoring/activity/log', function () {
    it('records the activity for the caller in the caller organization', async function () {
      const orgId = admin.organization.id;
      const scope = mockBackend('activity')
        .post(
          '/api/v1/activity/',
          (body: Record<string, unknown>) =>
            body.activity_type === 'coding' && body.user_id === member.user.id && body.organization_id === orgId
        )
        .reply(201, { id: 3, activity_type: 'coding' });

      const response = await request(app)
        .post(`${baseUrl}/monitoring/activity/log`)
        .set('Authorization', bearer(member.token))
        .send({ activity_type: 'coding', user_id: 'someone-else' });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ id: 3, activity_type: 'coding' });
      expect(scope.isDone()).toBe(true);
    });
  });

  describe('GET /monitoring/stats/:userId/productivity', function () {
    it('returns the caller own stats', async function () {
      mockBackend('activity')
        .get(`/api/v1/productivity/user/${member.user.id}/stats`)
        .reply(200, { productivity_score: 81 });

      const response = await request(app)
        .get(`${baseUrl}/monitoring/stats/${member.user.id}/productivity`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ productivity_score: 81 });
    });

    it('returns 403 when a member asks for the stats of someone else', async function () {
      const response = await request(app)
        .get(`${baseUrl}/monitoring/stats/${manager.user.id}/productivity`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(403);
      expect(response.body.code).toBe('Forbidden');
    });

    it('lets managers read the stats of members of their organization', async function () {
      mockBackend('activity')
        .get(`/api/v1/productivity/user/${member.user.id}/stats`)
        .reply(200, { productivity_score: 64 });

      const response = await request(app)
        .get(`${baseUrl}/monitoring/stats/${member.user.id}/productivity`)
        .set('Authorization', bearer(manager.token));

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ productivity_score: 64 });
    });

    it('returns 404 for a user outside the caller organization', async function () {
      const stranger = await createTestAccount();

      const response = await request(app)
        .get(`${baseUrl}/monitoring/stats/${stranger.user.id}/productivity`)
        .set('Authorization', bearer(manager.token));

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: `User with ID ${stranger.user.id} not found`, code: 'NotFound' });
    });
  });

  describe('performance', function () {
    it('routes the score to the caller', async function () {
      mockBackend('performance')
        .get(`/api/v1/analytics/user/${member.user.id}/performance`)
        .reply(200, { overall_score: 4.2 });

      const response = await request(app).get(`${baseUrl}/performance/score`).set('Authorization', bearer(member.token));

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ overall_score: 4.2 });
    });

    it('drops feedback of other organizations', async function () {
      mockBackend('performance')
        .get(`/api/v1/feedback/user/${member.user.id}`)
        .reply(200, [
          { id: 1, comment: 'Great', organization_id: admin.organization.id },
          { id: 2, comment: 'Elsewhere', organization_id: 'other-org' },
        ]);

      const response = await request(app)
        .get(`${baseUrl}/performance/feedback`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(200);
      expect(response.body).toEqual([{ id: 1, comment: 'Great', organization_id: admin.organization.id }]);
    });

    it('returns team performance for the caller organization', async function () {
      mockBackend('performance')
        .get(`/api/v1/analytics/team/${admin.organization.id}/performance`)
        .reply(200, { average_score: 3.9 });

      const response = await request(app)
        .get(`${baseUrl}/performance/team/${admin.organization.id}/performance`)
        .set('Authorization', bearer(manager.token));

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ average_score: 3.9 });
    });

    it('returns 404 for the team performance of another organization', async function () {
      const response = await request(app)
        .get(`${baseUrl}/performance/team/another-organization/performance`)
        .set('Authorization', bearer(manager.token));

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Organization with ID another-organization not found', code: 'NotFound' });
    });

    it('returns 403 for members asking for team performance', async function () {
      const response = await request(app)
        .get(`${baseUrl}/performance/team/${admin.organization.id}/performance`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(403);
    });
  });

  describe('GET /research/researchers', function () {
    it('drops researchers of labs the caller cannot see', async function () {
      mockBackend('labs')
        .get('/researchers')
        .reply(200, [
          { id: 1, name: 'Ada', lab_id: 1 },
          { id: 2, name: 'Foreign', lab_id: 9 },
          { id: 3, name: 'Unassigned' },
        ]);
      mockBackend('labs')
        .get('/labs')
        .reply(200, [
          { id: 1, name: 'Optics', organization_id: admin.organization.id },
          { id: 9, name: 'Acoustics', organization_id: 'other-org' },
        ]);

      const response = await request(app)
        .get(`${baseUrl}/research/researchers`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(200);
      expect(response.body).toEqual([{ id: 1, name: 'Ada', lab_id: 1 }]);
    });
  });

  describe('GET /research/labs/:labId/researchers', function () {
    it('returns the researchers of a lab of the caller organization', async function () {
      mockBackend('labs').get('/labs/1').reply(200, { id: 1, name: 'Optics', organization_id: admin.organization.id });
      mockBackend('labs')
        .get('/researchers/by-lab/1')
        .reply(200, [{ id: 1, name: 'Ada', lab_id: 1 }]);

      const response = await request(app)
        .get(`${baseUrl}/research/labs/1/researchers`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(200);
      expect(response.body).toEqual([{ id: 1, name: 'Ada', lab_id: 1 }]);
    });

    it('returns 404 for a lab of another organization', async function () {
      mockBackend('labs').get('/labs/9').reply(200, { id: 9, name: 'Acoustics', organization_id: 'other-org' });
      const researchers = mockBackend('labs').get('/researchers/by-lab/9').reply(200, [{ id: 2, lab_id: 9 }]);

      const response = await request(app)
        .get(`${baseUrl}/research/labs/9/researchers`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Lab not found', code: 'NotFound' });
      expect(researchers.isDone()).toBe(false);
    });
  });

  describe('POST /research/researchers', function () {
    it('adds a researcher to a lab of the caller organization', async function () {
      const orgId = admin.organization.id;
      mockBackend('labs').get('/labs/1').reply(200, { id: 1, name: 'Optics', organization_id: orgId });
      const scope = mockBackend('labs')
        .post(
          '/researchers',
          (body: Record<string, unknown>) => body.name === 'Grace' && body.lab_id === 1 && body.organization_id === orgId
        )
        .reply(201, { id: 4, name: 'Grace', lab_id: 1 });

      const response = await request(app)
        .post(`${baseUrl}/research/researchers`)
        .set('Authorization', bearer(manager.token))
        .send({ name: 'Grace', lab_id: 1 });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ id: 4, name: 'Grace', lab_id: 1 });
      expect(scope.isDone()).toBe(true);
    });

    it('returns 404 for a lab of another organization', async function () {
      mockBackend('labs').get('/labs/9').reply(200, { id: 9, name: 'Acoustics', organization_id: 'other-org' });
      const scope = mockBackend('labs').post('/researchers').reply(201, {});

      const response = await request(app)
        .post(`${baseUrl}/research/researchers`)
        .set('Authorization', bearer(manager.token))
        .send({ name: 'Grace', lab_id: 9 });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Lab not found', code: 'NotFound' });
      expect(scope.isDone()).toBe(false);
    });

    it('returns 403 for members', async function () {
      const response = await request(app)
        .post(`${baseUrl}/research/researchers`)
        .set('Authorization', bearer(member.token))
        .send({ name: 'Grace', lab_id: 1 });

      expect(response.status).toBe(403);
    });
  });
});

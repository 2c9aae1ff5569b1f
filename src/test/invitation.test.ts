import type { Server } from 'http';
import request from 'supertest';
import { v4 as uuidv4 } from 'uuid';
import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import container from '../main/config/container';
import { baseUrl, getApp, getRepositories, shutdownApp } from './utils/testApp';
import { createTestMember } from './utils/organization/organizationTestUtils';
import { bearer, createTestAccount, tokenFor, uniqueEmail, type TestAccount } from './utils/users/userTestUtils';

describe('Invitation API routes', function () {
  let app: Server;
  let admin: TestAccount;
  let manager: TestAccount;
  let member: TestAccount;

  const invitationsUrl = () => `${baseUrl}/organizations/${admin.organization.id}/invitations`;

  const invite = async (email: string, role?: string) => {
    const response = await request(app)
      .post(invitationsUrl())
      .set('Authorization', bearer(manager.token))
      .send(role ? { email, role } : { email });
    expect(response.status).toBe(201);
    return response.body;
  };

  beforeAll(async function () {
    app = await getApp();
    admin = await createTestAccount('Dorothy');
    manager = await createTestMember(admin.organization.id, 'manager');
    member = await createTestMember(admin.organization.id, 'member');
  });

  afterAll(async function () {
    await shutdownApp();
  });

  describe('POST /organizations/:organizationId/invitations', function () {
    it('returns 201 with a pending member invitation by default', async function () {
      const email = uniqueEmail();

      const response = await request(app)
        .post(invitationsUrl())
        .set('Authorization', bearer(manager.token))
        .send({ email: email.toUpperCase() });

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({
        organizationId: admin.organization.id,
        email,
        role: 'member',
        status: 'pending',
        invitedBy: manager.user.id,
        respondedAt: null,
      });
    });

    it('returns 403 when a member invites', async function () {
      const response = await request(app)
        .post(invitationsUrl())
        .set('Authorization', bearer(member.token))
        .send({ email: uniqueEmail() });

      expect(response.status).toBe(403);
    });

    it('returns 403 when the role is above the inviter role', async function () {
      const response = await request(app)
        .post(invitationsUrl())
        .set('Authorization', bearer(manager.token))
        .send({ email: uniqueEmail(), role: 'admin' });

      expect(response.status).toBe(403);
      expect(response.body.error).toBe('You cannot invite with a role above your own (manager)');
    });

    it('returns 409 when the invitee is already a member', async function () {
      const response = await request(app)
        .post(invitationsUrl())
        .set('Authorization', bearer(manager.token))
        .send({ email: member.user.email });

      expect(response.status).toBe(409);
      expect(response.body.code).toBe('Conflict');
    });

    it('returns 409 when an invitation is already pending', async function () {
      const email = uniqueEmail();
      await invite(email);

      const response = await request(app)
        .post(invitationsUrl())
        .set('Authorization', bearer(manager.token))
        .send({ email });

      expect(response.status).toBe(409);
      expect(response.body.error).toBe(`${email} already has a pending invitation to this organization`);
    });

    it('returns 404 for another organization', async function () {
      const stranger = await createTestAccount();

      const response = await request(app)
        .post(`${baseUrl}/organizations/${stranger.organization.id}/invitations`)
        .set('Authorization', bearer(admin.token))
        .send({ email: uniqueEmail() });

      expect(response.status).toBe(404);
    });
  });

  describe('GET /organizations/:organizationId/invitations', function () {
    it('lists the invitations of the organization', async function () {
      const email = uniqueEmail();
      const created = await invite(email, 'manager');

      const response = await request(app).get(invitationsUrl()).set('Authorization', bearer(admin.token));

      expect(response.status).toBe(200);
      const listed = response.body.find((invitation: { id: string }) => invitation.id === created.id);
      expect(listed).toMatchObject({ email, role: 'manager', status: 'pending' });
    });
  });

  describe('answering invitations', function () {
    it('lists pending invitations addressed to the caller', async function () {
      const invitee = await createTestAccount();
      const created = await invite(invitee.user.email);

      const response = await request(app).get(`${baseUrl}/invitations/mine`).set('Authorization', bearer(invitee.token));

      expect(response.status).toBe(200);
      expect(response.body).toHaveLength(1);
      expect(response.body[0].id).toBe(created.id);
      expect(response.body[0].organizationName).toBe("Dorothy's Organization");
    });

    it('accepts an invitation and returns a session for the organization', async function () {
      const invitee = await createTestAccount();
      const created = await invite(invitee.user.email, 'manager');

      const response = await request(app)
        .post(`${baseUrl}/invitations/${created.id}/accept`)
        .set('Authorization', bearer(invitee.token));

      expect(response.status).toBe(200);
      expect(response.body.invitation.status).toBe('accepted');
      expect(response.body.membership).toEqual({
        userId: invitee.user.id,
        organizationId: admin.organization.id,
        organizationName: "Dorothy's Organization",
        role: 'manager',
      });
      expect(response.body.session.organizationId).toBe(admin.organization.id);
      expect(response.body.session.role).toBe('manager');

      const current = await request(app)
        .get(`${baseUrl}/organizations/current`)
        .set('Authorization', bearer(response.body.session.accessToken));
      expect(current.status).toBe(200);
      expect(current.body.id).toBe(admin.organization.id);

      const stored = await getRepositories().users.findById(invitee.user.id);
      expect(stored?.defaultOrganizationId).toBe(invitee.organization.id);
    });

    it('sets the default organization of a user without one', async function () {
      const credentialService = container.resolve('credentialService');
      const user = await getRepositories().users.create({
        email: uniqueEmail(),
        name: 'Orphan',
        passwordHash: await credentialService.hashPassword('test-password'),
      });
      const created = await invite(user.email);

      const response = await request(app)
        .post(`${baseUrl}/invitations/${created.id}/accept`)
        .set('Authorization', bearer(tokenFor(user.id, uuidv4(), 'member')));

      expect(response.status).toBe(200);
      const stored = await getRepositories().users.findById(user.id);
      expect(stored?.defaultOrganizationId).toBe(admin.organization.id);
    });

    it('returns 409 when an accepted invitation is answered again', async function () {
      const invitee = await createTestAccount();
      const created = await invite(invitee.user.email);
      const acceptUrl = `${baseUrl}/invitations/${created.id}/accept`;

      await request(app).post(acceptUrl).set('Authorization', bearer(invitee.token)).expect(200);

      const again = await request(app).post(acceptUrl).set('Authorization', bearer(invitee.token));
      expect(again.status).toBe(409);
      expect(again.body).toEqual({ error: 'This invitation has already been accepted', code: 'InvalidState' });

      const rejected = await request(app)
        .post(`${baseUrl}/invitations/${created.id}/reject`)
        .set('Authorization', bearer(invitee.token));
      expect(rejected.status).toBe(409);
      expect(rejected.body.code).toBe('InvalidState');
    });

    it('leaves the invitation pending when joining the organization fails', async function () {
      const invitee = await createTestAccount();
      const created = await invite(invitee.user.email);
      const acceptUrl = `${baseUrl}/invitations/${created.id}/accept`;
      const addMember = vi
        .spyOn(getRepositories().organizations, 'addMember')
        .mockRejectedValueOnce(new Error('write conflict'));

      const failed = await request(app).post(acceptUrl).set('Authorization', bearer(invitee.token));

      expect(failed.status).toBe(500);
      expect(failed.body).toEqual({ error: 'write conflict', code: 'Internal' });
      const stored = await getRepositories().invitations.findById(created.id);
      expect(stored?.status).toBe('pending');
      expect(stored?.respondedAt).toBeNull();

      addMember.mockRestore();
      const retried = await request(app).post(acceptUrl).set('Authorization', bearer(invitee.token));
      expect(retried.status).toBe(200);
      expect(retried.body.membership.organizationId).toBe(admin.organization.id);
    });

    it('rejects an invitation without joining the organization', async function () {
      const invitee = await createTestAccount();
      const created = await invite(invitee.user.email);

      const response = await request(app)
        .post(`${baseUrl}/invitations/${created.id}/reject`)
        .set('Authorization', bearer(invitee.token));

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('rejected');
      expect(response.body.respondedAt).not.toBeNull();

      const organization = await getRepositories().organizations.findById(admin.organization.id);
      expect(organization?.members.some(m => m.userId === invitee.user.id)).toBe(false);

      const mine = await request(app).get(`${baseUrl}/invitations/mine`).set('Authorization', bearer(invitee.token));
      expect(mine.body).toEqual([]);
    });

    it('returns 403 when the invitation was sent to another email', async function () {
      const created = await invite(uniqueEmail());

      const response = await request(app)
        .post(`${baseUrl}/invitations/${created.id}/accept`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(403);
      expect(response.body.error).toBe('This invitation was sent to another email address');
    });

    it('returns 404 for an unknown invitation', async function () {
      const response = await request(app)
        .post(`${baseUrl}/invitations/${uuidv4()}/accept`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(404);
    });

    it('returns 400 when the invitation id is not a UUID', async function () {
      const response = await request(app)
        .post(`${baseUrl}/invitations/abc/reject`)
        .set('Authorization', bearer(member.token));

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('invitationId must be a valid UUID');
    });
  });
});

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { USER_ROLE } from '../../src/constants/user.constants';
import { createTestContext, signUp, TestContext } from '../helpers/app';

describe('admin routes', () => {
  let ctx: TestContext;
  let adminAuth: { Authorization: string };

  beforeEach(async () => {
    ctx = createTestContext();
    const admin = await signUp(ctx, 'root', { role: USER_ROLE.ADMIN });
    adminAuth = { Authorization: `Bearer ${admin.token}` };
  });

  it('is closed to regular users', async () => {
    const { token } = await signUp(ctx, 'alice');

    const res = await request(ctx.app).get('/api/admin/roles').set('Authorization', `Bearer ${token}`);

    expect(res.status).toBe(403);
  });

  it('creates and lists roles', async () => {
    const created = await request(ctx.app).post('/api/admin/roles').set(adminAuth).send({ name: 'Moderator' });
    const duplicate = await request(ctx.app).post('/api/admin/roles').set(adminAuth).send({ name: 'Moderator' });
    const invalid = await request(ctx.app).post('/api/admin/roles').set(adminAuth).send({ name: 'Owner' });
    const listed = await request(ctx.app).get('/api/admin/roles').set(adminAuth);

    expect(created.status).toBe(201);
    expect(created.body.data).toEqual({ id: 3, name: 'Moderator' });
    expect(duplicate.status).toBe(400);
    expect(duplicate.body.error.code).toBe('DUPLICATE_ROLE');
    expect(invalid.status).toBe(400);
    expect(listed.body.data.map((role: { name: string }) => role.name)).toEqual(['User', 'Admin', 'Moderator']);
  });

  it('assigns roles to users', async () => {
    const { user } = await signUp(ctx, 'alice');
    await ctx.roles.ensureRole(USER_ROLE.MODERATOR);

    const res = await request(ctx.app)
      .patch(`/api/admin/users/${user.id}/role`)
      .set(adminAuth)
      .send({ role: 'Moderator' });

    expect(res.status).toBe(200);
    expect(res.body.message).toBe('Role assigned');
    expect(res.body.data.role).toBe('Moderator');
  });

  it('reports unknown users and invalid roles', async () => {
    const unknown = await request(ctx.app).patch('/api/admin/users/999/role').set(adminAuth).send({ role: 'User' });
    const invalid = await request(ctx.app).patch('/api/admin/users/1/role').set(adminAuth).send({ role: 'Owner' });

    expect(unknown.status).toBe(404);
    expect(unknown.body.message).toBe('User not found');
    expect(invalid.status).toBe(400);
    expect(invalid.body.error.details[0].message).toBe('Role must be one of User, Admin, Moderator');
  });

  it("sees every user's contacts", async () => {
    const alice = await signUp(ctx, 'alice');
    const mallory = await signUp(ctx, 'mallory');
    await ctx.contacts.create({ firstname: 'Bob', lastname: 'Lee', birthday: '1990-05-01' }, alice.user.id);
    await ctx.contacts.create({ firstname: 'Eve', lastname: 'Moss', birthday: '1991-06-01' }, mallory.user.id);

    const all = await request(ctx.app).get('/api/admin/contacts').set(adminAuth);
    const found = await request(ctx.app).get('/api/admin/contacts/search').query({ query: 'moss' }).set(adminAuth);
    const missing = await request(ctx.app).get('/api/admin/contacts/search').query({ query: 'zed' }).set(adminAuth);

    expect(all.body.data.map((contact: { owner_id: number }) => contact.owner_id)).toEqual([
      alice.user.id,
      mallory.user.id,
    ]);
    expect(found.body.data).toHaveLength(1);
    expect(missing.status).toBe(404);
  });
});

/**
 * Tests for TeamProvisioner against an in-process FOSSA stand-in
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { setupServer } from 'msw/node';
import { http, HttpResponse } from 'msw';
import { FossaAPIClient } from '@/features/teams/api/FossaAPIClient.js';
import { TeamProvisioner } from '@/features/teams/provisioner/TeamProvisioner.js';
import { ApiError, ConfigurationError } from '@/shared/utils/errors.js';
import { ENDPOINT, createFossaState, teamHandlers, type FakeFossaState } from '../../../helpers/fossaServer.js';
import { silentLogger } from '../../../helpers/fakes.js';

// MSW server setup
const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

function provisionerFor(state: FakeFossaState): TeamProvisioner {
  server.use(...teamHandlers(state));
  const client = new FossaAPIClient({ endpoint: ENDPOINT, token: 'test-secret' });
  return new TeamProvisioner(client, silentLogger());
}

describe('TeamProvisioner', () => {
  describe('teamExists()', () => {
    it('should find an existing team by exact name', async () => {
      const state = createFossaState([{ name: 'Platform', id: 1 }]);
      const provisioner = provisionerFor(state);

      await expect(provisioner.teamExists('Platform')).resolves.toBe(true);
      expect(state.createRequests).toEqual([]);
    });

    it('should match names case-sensitively', async () => {
      const state = createFossaState([{ name: 'Platform', id: 1 }]);
      const provisioner = provisionerFor(state);

      await expect(provisioner.teamExists('platform')).resolves.toBe(false);
    });

    it('should send the API key as a bearer token', async () => {
      const state = createFossaState();
      const provisioner = provisionerFor(state);

      await provisioner.teamExists('Anything');

      expect(state.authHeaders).toEqual(['Bearer test-secret']);
    });

    it('should fail on a non-200 list response', async () => {
      const state = createFossaState();
      state.listStatus = 401;
      const provisioner = provisionerFor(state);

      const error = await provisioner.teamExists('Platform').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({
        message: 'Failed to fetch teams (HTTP 401)',
        statusCode: 401,
      });
    });

    it('should keep the body complaint when the list status was accepted', async () => {
      const provisioner = provisionerFor(createFossaState());
      server.use(http.get(`${ENDPOINT}/api/teams`, () => HttpResponse.json({ teams: [] })));

      const error = await provisioner.teamExists('Platform').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({
        message:
          'Failed to fetch teams: GET /api/teams returned an unexpected body (expected an array)',
        statusCode: 200,
      });
    });

    it('should reject an empty team name before any request', async () => {
      const state = createFossaState();
      const provisioner = provisionerFor(state);

      await expect(provisioner.teamExists('   ')).rejects.toBeInstanceOf(ConfigurationError);
      expect(state.authHeaders).toEqual([]);
    });
  });

  describe('createTeam()', () => {
    it('should accept 201 and return the server id', async () => {
      const state = createFossaState();
      state.createBody = { id: 7, name: 'Data' };
      const provisioner = provisionerFor(state);

      await expect(provisioner.createTeam('Data')).resolves.toBe(7);
    });

    it('should accept 200 whatever the body looks like', async () => {
      const state = createFossaState();
      state.createStatus = 200;
      state.createBody = 'created';
      const provisioner = provisionerFor(state);

      await expect(provisioner.createTeam('Data')).resolves.toBeNull();
    });

    it('should tolerate an empty create response', async () => {
      const state = createFossaState();
      state.createBody = null;
      const provisioner = provisionerFor(state);

      await expect(provisioner.createTeam('Data')).resolves.toBeNull();
    });

    it('should fail on any other status', async () => {
      const state = createFossaState();
      state.createStatus = 409;
      const provisioner = provisionerFor(state);

      const error = await provisioner.createTeam('Data').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({
        message: 'Failed to create team (HTTP 409)',
        statusCode: 409,
      });
    });
  });

  describe('provision()', () => {
    it('should not create a team that already exists', async () => {
      const state = createFossaState([{ name: 'Platform', id: 1 }]);
      const provisioner = provisionerFor(state);

      const result = await provisioner.provision('Platform');

      expect(result).toEqual({ name: 'Platform', created: false, id: null });
      expect(state.createRequests).toEqual([]);
    });

    it('should create a missing team exactly once with autoAddUsers disabled', async () => {
      const state = createFossaState([]);
      const provisioner = provisionerFor(state);

      const result = await provisioner.provision('New Team');

      expect(state.createRequests).toEqual([{ name: 'New Team', autoAddUsers: false }]);
      expect(result).toEqual({ name: 'New Team', created: true, id: 123 });
    });

    it('should not attempt a create when listing fails', async () => {
      const state = createFossaState([]);
      state.listStatus = 500;
      const provisioner = provisionerFor(state);

      await expect(provisioner.provision('New Team')).rejects.toBeInstanceOf(ApiError);
      expect(state.createRequests).toEqual([]);
    });

    it('should converge to a single create across repeated runs', async () => {
      const state = createFossaState([]);
      const provisioner = provisionerFor(state);

      const first = await provisioner.provision('Security');
      const second = await provisioner.provision('Security');

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(state.createRequests).toHaveLength(1);
    });
  });
});

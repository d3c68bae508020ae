import {
  deactivateUser,
  formatWalletAddress,
  getAllUsers,
  getUserByEmail,
  grantRole,
  initializeFirstAdmin,
  reactivateUser,
  registerUser,
  requireUser,
  resolveDisplayName,
  updateDisplayName
} from '../../src/services/userService';
import { authorize, hasCapability } from '../../src/services/roleService';
import { getAuditTrail } from '../../src/services/auditService';
import { ConflictError, PermissionError, ValidationError } from '../../src/errors';
import {
  createTestUser,
  holdWriteLock,
  mockEnv,
  SharedDatabase,
  sharedFileEnvs,
  silenceConsole,
  TestEnv
} from '../test-helpers';

describe('User Service', () => {
  let env: TestEnv;

  beforeEach(() => {
    silenceConsole();
    env = mockEnv();
  });

  afterEach(() => {
    env.DB.close();
    jest.restoreAllMocks();
  });

  describe('formatWalletAddress', () => {
    it('shortens long addresses', () => {
      expect(formatWalletAddress('0x1234567890abcdef')).toBe('0x1234...cdef');
    });

    it('keeps short addresses and handles missing ones', () => {
      expect(formatWalletAddress('0x12345678')).toBe('0x12345678');
      expect(formatWalletAddress(null)).toBe('No wallet');
      expect(formatWalletAddress(undefined)).toBe('No wallet');
    });
  });

  describe('resolveDisplayName', () => {
    it('prefers the chosen name, then the OAuth name, then the wallet', () => {
      expect(resolveDisplayName({ name: 'Sam', oauthName: 'Samuel', walletAddress: '0x1234567890abcdef' })).toBe('Sam');
      expect(resolveDisplayName({ oauthName: 'Samuel', walletAddress: '0x1234567890abcdef' })).toBe('Samuel');
      expect(resolveDisplayName({ walletAddress: '0x1234567890abcdef' })).toBe('0x1234...cdef');
    });
  });

  describe('registerUser', () => {
    it('stores lower-cased emails as members by default', async () => {
      const user = await registerUser({ email: ' Casey@Example.com ', name: 'Casey' }, env);

      expect(user).toMatchObject({ email: 'casey@example.com', role: 'member', loginType: 'email', active: true });
      expect(getUserByEmail('CASEY@example.com', env)?.id).toBe(user.id);
    });

    it('infers wallet and OAuth logins', async () => {
      expect((await registerUser({ walletAddress: '0xabc' }, env)).loginType).toBe('wallet');
      expect((await registerUser({ oauthName: 'Robin' }, env)).loginType).toBe('oauth');
    });

    it('requires an identity and a unique email', async () => {
      await registerUser({ email: 'casey@example.com' }, env);

      await expect(registerUser({ name: 'Nobody' }, env)).rejects.toThrow(ValidationError);
      await expect(registerUser({ email: 'CASEY@example.com' }, env))
        .rejects.toThrow('A user with email casey@example.com already exists');
      await expect(registerUser({ email: 'not-an-email' }, env)).rejects.toThrow('Invalid email address: not-an-email');
    });
  });

  describe('updateDisplayName', () => {
    it('trims the name and records when it was set', async () => {
      const user = await createTestUser(env);
      env.clock.advance(5000);

      expect(await updateDisplayName(user, '  River  ', env)).toMatchObject({
        name: 'River',
        displayNameSetAt: '2025-03-01T09:00:05.000Z',
      });
    });

    it('rejects empty and overlong names', async () => {
      const user = await createTestUser(env);

      await expect(updateDisplayName(user, '   ', env)).rejects.toThrow('Display name cannot be empty');
      await expect(updateDisplayName(user, 'x'.repeat(51), env)).rejects.toThrow('Display name must be 50 characters or less');
    });
  });

  describe('role management', () => {
    it('lets admins change roles and audits the change', async () => {
      const admin = await createTestUser(env, 'admin');
      const member = await createTestUser(env);

      const promoted = await grantRole(admin, member.id, 'chair', env);

      expect(promoted.role).toBe('chair');
      expect(getAuditTrail('user', member.id, env)).toEqual([
        expect.objectContaining({ action: 'role_changed', fromStatus: 'member', toStatus: 'chair', actorId: admin.id }),
      ]);
    });

    it('leaves the audit trail alone when the role is unchanged', async () => {
      const admin = await createTestUser(env, 'admin');
      const member = await createTestUser(env);

      expect((await grantRole(admin, member.id, 'member', env)).role).toBe('member');
      expect(getAuditTrail('user', member.id, env)).toEqual([]);
    });

    it('refuses role changes from non-admins', async () => {
      const chair = await createTestUser(env, 'chair');
      const member = await createTestUser(env);

      await expect(grantRole(chair, member.id, 'admin', env))
        .rejects.toThrow(new PermissionError("Role 'chair' may not perform 'user:manage'"));
    });

    it('deactivates and reactivates without deleting', async () => {
      const admin = await createTestUser(env, 'admin');
      const editor = await createTestUser(env, 'editor');

      const inactive = await deactivateUser(admin, editor.id, env);
      expect(inactive.active).toBe(false);
      expect(() => authorize(inactive, 'submission:review')).toThrow('This account has been deactivated');
      expect(getAllUsers(env).map(user => user.id)).toContain(editor.id);

      const active = await reactivateUser(admin, editor.id, env);
      expect(() => authorize(active, 'submission:review')).not.toThrow();
      expect(getAuditTrail('user', editor.id, env).map(entry => entry.action)).toEqual(['deactivated', 'reactivated']);
    });
  });

  describe('capabilities', () => {
    it('grants each role its capabilities', () => {
      expect(hasCapability('member', 'submission:review')).toBe(false);
      expect(hasCapability('editor', 'submission:review')).toBe(true);
      expect(hasCapability('editor', 'document:supersede')).toBe(false);
      expect(hasCapability('editor', 'group:manage')).toBe(false);
      expect(hasCapability('chair', 'document:supersede')).toBe(true);
      expect(hasCapability('chair', 'group:manage')).toBe(true);
      expect(hasCapability('chair', 'user:manage')).toBe(false);
      expect(hasCapability('admin', 'user:manage')).toBe(true);
    });
  });

  describe('initializeFirstAdmin', () => {
    it('does nothing without an address', async () => {
      expect(await initializeFirstAdmin(undefined, env)).toBeNull();
      expect(getAllUsers(env)).toEqual([]);
    });

    it('creates the admin account', async () => {
      const admin = await initializeFirstAdmin('admin@example.com', env);
      expect(admin).toMatchObject({ email: 'admin@example.com', role: 'admin' });
    });

    it('promotes an existing account', async () => {
      const existing = await registerUser({ email: 'admin@example.com' }, env);
      const admin = await initializeFirstAdmin('admin@example.com', env);

      expect(admin).toMatchObject({ id: existing.id, role: 'admin', active: true });
    });
  });

  describe('under a competing writer', () => {
    let shared: SharedDatabase;

    beforeEach(() => {
      shared = sharedFileEnvs(2);
    });

    afterEach(() => {
      shared.close();
    });

    it('reports role and status changes blocked past every retry as conflicts', async () => {
      const [writer, rival] = shared.envs;
      const admin = await createTestUser(writer, 'admin');
      const member = await createTestUser(writer);

      const lock = holdWriteLock(rival);
      try {
        await expect(grantRole(admin, member.id, 'editor', writer)).rejects.toThrow(ConflictError);
        await expect(deactivateUser(admin, member.id, writer)).rejects.toThrow(ConflictError);
      } finally {
        lock.release();
      }

      expect(requireUser(member.id, writer)).toMatchObject({ role: 'member', active: true });
    });

    it('registers the user once the competing writer commits', async () => {
      const [writer, rival] = shared.envs;
      const lock = holdWriteLock(rival);
      setTimeout(() => lock.release(), 30);

      const user = await registerUser({ email: 'late@example.com' }, writer);

      expect(getUserByEmail('late@example.com', rival)?.id).toBe(user.id);
    });
  });
});

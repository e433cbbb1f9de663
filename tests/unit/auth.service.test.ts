import { SignJWT } from 'jose';
import { createSecretKey } from 'crypto';
import { AuthService } from '../../src/services/auth/auth.service';
import { UserService } from '../../src/services/auth/user.service';
import { AuthError, ConflictError } from '../../src/errors';
import { MemoryUserStore } from '../helpers/memory-stores';

const SECRET = 'test-secret-test-secret';

describe('AuthService', () => {
  let store: MemoryUserStore;
  let users: UserService;
  let auth: AuthService;

  beforeEach(async () => {
    store = new MemoryUserStore();
    users = new UserService(store, 4);
    auth = new AuthService(users, { secret: SECRET, algorithm: 'HS256', expiresInMinutes: 30 });
    await users.register({ username: 'reader', email: 'Reader@Example.com', password: 'password-1' });
  });

  describe('register', () => {
    it('should store a bcrypt hash and lowercase the email', () => {
      const [user] = store.users;
      expect(user.email).toBe('reader@example.com');
      expect(user.passwordHash).not.toBe('password-1');
      expect(user.passwordHash.startsWith('$2b$04$')).toBe(true);
    });

    it('should not return the password hash', async () => {
      const user = await users.register({ username: 'other', password: 'password-2' });
      expect(user).toEqual({
        id: 2,
        username: 'other',
        email: null,
        isActive: true,
        createdAt: new Date('2024-01-01T00:00:00Z'),
      });
    });

    it('should reject a taken username regardless of case', async () => {
      await expect(users.register({ username: 'READER', password: 'password-2' })).rejects.toThrow(
        ConflictError
      );
    });

    it('should reject a taken email', async () => {
      await expect(
        users.register({ username: 'other', email: 'reader@example.com', password: 'password-2' })
      ).rejects.toThrow('Email already registered');
    });
  });

  describe('login', () => {
    it('should issue a bearer token for valid credentials', async () => {
      const token = await auth.login('reader', 'password-1');

      expect(token.token_type).toBe('bearer');
      expect(token.expires_in).toBe(1800);
      expect(token.access_token.split('.')).toHaveLength(3);
    });

    it('should reject a wrong password', async () => {
      await expect(auth.login('reader', 'wrong-password')).rejects.toThrow(
        'Incorrect username or password'
      );
    });

    it('should reject an unknown user', async () => {
      await expect(auth.login('nobody', 'password-1')).rejects.toThrow(AuthError);
    });

    it('should reject a deactivated account', async () => {
      store.users[0].isActive = false;
      await expect(auth.login('reader', 'password-1')).rejects.toThrow('Account has been deactivated');
    });
  });

  describe('authenticate', () => {
    it('should resolve an issued token to its user', async () => {
      const { access_token } = await auth.login('reader', 'password-1');
      const user = await auth.authenticate(access_token);

      expect(user.username).toBe('reader');
      expect(user).not.toHaveProperty('passwordHash');
    });

    it('should reject a malformed token', async () => {
      await expect(auth.authenticate('not-a-token')).rejects.toThrow(AuthError);
    });

    it('should reject a token signed with another secret', async () => {
      const other = new AuthService(users, {
        secret: 'another-secret-value',
        algorithm: 'HS256',
        expiresInMinutes: 30,
      });
      const { access_token } = await other.login('reader', 'password-1');

      await expect(auth.authenticate(access_token)).rejects.toThrow(AuthError);
    });

    it('should reject an expired token', async () => {
      const expired = await new SignJWT({ username: 'reader' })
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject('1')
        .setIssuedAt(Math.floor(Date.now() / 1000) - 3600)
        .setExpirationTime(Math.floor(Date.now() / 1000) - 60)
        .sign(createSecretKey(Buffer.from(SECRET, 'utf-8')));

      await expect(auth.authenticate(expired)).rejects.toThrow(AuthError);
    });

    it('should reject a token for a user that no longer exists', async () => {
      const { access_token } = await auth.login('reader', 'password-1');
      store.users = [];

      await expect(auth.authenticate(access_token)).rejects.toThrow(AuthError);
    });
  });
});

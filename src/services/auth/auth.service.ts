import { createSecretKey, KeyObject } from 'crypto';
import { SignJWT, jwtVerify } from 'jose';
import { AuthError } from '../../errors.js';
import { logger } from '../../config/logger.js';
import { User } from '../../types/models.js';
import { UserService } from './user.service.js';

export interface TokenOptions {
  secret: string;
  algorithm: 'HS256' | 'HS384' | 'HS512';
  expiresInMinutes: number;
}

export interface AccessToken {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;
}

export class AuthService {
  private readonly secretKey: KeyObject;

  constructor(
    private readonly users: UserService,
    private readonly options: TokenOptions
  ) {
    this.secretKey = createSecretKey(Buffer.from(options.secret, 'utf-8'));
  }

  /**
   * Check username/password and issue a bearer token.
   */
  async login(username: string, password: string): Promise<AccessToken> {
    const user = await this.users.findByUsername(username);

    if (!user) {
      // Same hashing work as a real check, so unknown usernames are not faster
      await this.users.hashPassword(password);
      throw new AuthError('Incorrect username or password');
    }

    const isValid = await this.users.verifyPassword(password, user.passwordHash);
    if (!isValid) {
      throw new AuthError('Incorrect username or password');
    }

    if (!user.isActive) {
      throw new AuthError('Account has been deactivated');
    }

    logger.info('User logged in', { userId: user.id });
    return this.issueToken(user);
  }

  async issueToken(user: User): Promise<AccessToken> {
    const token = await new SignJWT({ username: user.username })
      .setProtectedHeader({ alg: this.options.algorithm })
      .setSubject(String(user.id))
      .setIssuedAt()
      .setExpirationTime(`${this.options.expiresInMinutes}m`)
      .sign(this.secretKey);

    return {
      access_token: token,
      token_type: 'bearer',
      expires_in: this.options.expiresInMinutes * 60,
    };
  }

  /**
   * Resolve a bearer token to its active user. Expired, tampered or
   * orphaned tokens raise AuthError.
   */
  async authenticate(token: string): Promise<User> {
    let subject: string | undefined;
    try {
      const { payload } = await jwtVerify(token, this.secretKey, {
        algorithms: [this.options.algorithm],
      });
      subject = payload.sub;
    } catch (error) {
      logger.debug('JWT verification failed', { error });
      throw new AuthError();
    }

    const userId = subject ? parseInt(subject, 10) : NaN;
    if (!Number.isInteger(userId)) {
      throw new AuthError();
    }

    const user = await this.users.getById(userId);
    if (!user || !user.isActive) {
      throw new AuthError();
    }
    return user;
  }
}

import bcrypt from 'bcrypt';
import { UserStore } from '../../db/user.store.js';
import { ConflictError } from '../../errors.js';
import { logger } from '../../config/logger.js';
import { User, UserWithHash } from '../../types/models.js';

export interface RegisterInput {
  username: string;
  email?: string;
  password: string;
}

export function toPublicUser(user: UserWithHash): User {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    isActive: user.isActive,
    createdAt: user.createdAt,
  };
}

export class UserService {
  constructor(
    private readonly store: UserStore,
    private readonly saltRounds: number
  ) {}

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.saltRounds);
  }

  async verifyPassword(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }

  async register(input: RegisterInput): Promise<User> {
    if (await this.store.findByUsername(input.username)) {
      throw new ConflictError('Username already registered');
    }
    if (input.email && (await this.store.findByEmail(input.email))) {
      throw new ConflictError('Email already registered');
    }

    const user = await this.store.create({
      username: input.username,
      email: input.email?.toLowerCase() ?? null,
      passwordHash: await this.hashPassword(input.password),
    });

    logger.info('User created', { userId: user.id });
    return user;
  }

  async findByUsername(username: string): Promise<UserWithHash | null> {
    return this.store.findByUsername(username);
  }

  async getById(id: number): Promise<User | null> {
    const user = await this.store.findById(id);
    return user ? toPublicUser(user) : null;
  }
}

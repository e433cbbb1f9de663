import { Database } from './client.js';
import { User, UserWithHash } from '../types/models.js';

export interface CreateUserInput {
  username: string;
  email: string | null;
  passwordHash: string;
}

export interface UserStore {
  findById(id: number): Promise<UserWithHash | null>;
  findByUsername(username: string): Promise<UserWithHash | null>;
  findByEmail(email: string): Promise<UserWithHash | null>;
  create(input: CreateUserInput): Promise<User>;
}

interface UserRow {
  id: number;
  username: string;
  email: string | null;
  password_hash: string;
  is_active: boolean;
  created_at: Date;
}

function mapRow(row: UserRow): UserWithHash {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    isActive: row.is_active,
    createdAt: row.created_at,
    passwordHash: row.password_hash,
  };
}

export class PgUserStore implements UserStore {
  constructor(private readonly db: Database) {}

  async findById(id: number): Promise<UserWithHash | null> {
    const result = await this.db.query<UserRow>('SELECT * FROM users WHERE id = $1', [id]);
    return result.rows[0] ? mapRow(result.rows[0]) : null;
  }

  async findByUsername(username: string): Promise<UserWithHash | null> {
    const result = await this.db.query<UserRow>(
      'SELECT * FROM users WHERE LOWER(username) = LOWER($1)',
      [username]
    );
    return result.rows[0] ? mapRow(result.rows[0]) : null;
  }

  async findByEmail(email: string): Promise<UserWithHash | null> {
    const result = await this.db.query<UserRow>(
      'SELECT * FROM users WHERE LOWER(email) = LOWER($1)',
      [email]
    );
    return result.rows[0] ? mapRow(result.rows[0]) : null;
  }

  async create(input: CreateUserInput): Promise<User> {
    const result = await this.db.query<UserRow>(
      `INSERT INTO users (username, email, password_hash)
       VALUES ($1, $2, $3)
       RETURNING *`,
      [input.username, input.email, input.passwordHash]
    );
    const { passwordHash: _hash, ...user } = mapRow(result.rows[0]);
    return user;
  }
}

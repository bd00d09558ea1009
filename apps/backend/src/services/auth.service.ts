import { randomUUID } from 'node:crypto';
import bcrypt from 'bcryptjs';
import type { User } from '@sensor-registry/shared-types';
import { isValidPassword, isValidUsername } from '@sensor-registry/shared-utils';
import type { DatabasePool } from '../db';
import { isUniqueViolation } from '../db/sqlite';
import { ConflictError, InvalidCredentialsError, ValidationError } from '../lib/errors';
import type { IssuedToken, TokenVerifier } from './token.service';

export interface Credentials {
  username: string;
  password: string;
}

export interface AuthServiceOptions {
  bcryptRounds: number;
  now?: () => Date;
}

interface UserRow {
  id: string;
  username: string;
  password_hash: string;
  created_at: number;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    createdAt: new Date(row.created_at),
  };
}

export class AuthService {
  private readonly now: () => Date;

  constructor(
    private readonly pool: DatabasePool,
    private readonly tokens: TokenVerifier,
    private readonly options: AuthServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async register(username: string, password: string): Promise<User> {
    if (!isValidUsername(username)) {
      throw new ValidationError('Username must be 3-64 characters of letters, digits, ".", "_" or "-"');
    }
    const strength = isValidPassword(password);
    if (!strength.valid) {
      throw new ValidationError('Password is too weak', strength.errors);
    }

    // Hash before leasing a connection
    const passwordHash = await bcrypt.hash(password, this.options.bcryptRounds);
    const row: UserRow = {
      id: randomUUID(),
      username,
      password_hash: passwordHash,
      created_at: this.now().getTime(),
    };

    try {
      await this.pool.withConnection((db) => {
        db.prepare<UserRow>(
          `INSERT INTO users (id, username, password_hash, created_at)
           VALUES (@id, @username, @password_hash, @created_at)`
        ).run(row);
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Username ${username} is already registered`);
      }
      throw error;
    }

    return toUser(row);
  }

  /** Exchanges valid credentials for a signed access token. */
  async authenticate(credentials: Credentials): Promise<IssuedToken> {
    const row = await this.pool.withConnection((db) =>
      db
        .prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?')
        .get(credentials.username)
    );

    // Unknown users and wrong passwords fail the same way
    if (!row || !(await bcrypt.compare(credentials.password, row.password_hash))) {
      throw new InvalidCredentialsError();
    }

    return this.tokens.issue({ userId: row.id, username: row.username });
  }

  async getUser(userId: string): Promise<User | null> {
    const row = await this.pool.withConnection((db) =>
      db.prepare<[string], UserRow>('SELECT * FROM users WHERE id = ?').get(userId)
    );
    return row ? toUser(row) : null;
  }
}

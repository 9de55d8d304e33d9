import { ERRORS } from '@/common/exceptions/errors-factory';
import { DatabaseService } from '@/database/database.service';
import { Injectable } from '@nestjs/common';
import { DatabaseError } from 'pg';
import { CreateUserInput, User } from './types/user.type';

export const USER_REPOSITORY = Symbol('USER_REPOSITORY');

export interface UserRepository {
  findByEmail(email: string): Promise<User | null>;
  findById(id: number): Promise<User | null>;
  /** Rejects with email_already_exists when the address is taken. */
  create(input: CreateUserInput): Promise<User>;
}

interface UserRow {
  id: string;
  email: string;
  password_hash: string;
  created_at: Date;
  updated_at: Date;
}

const UNIQUE_VIOLATION = '23505';
const COLUMNS = 'id, email, password_hash, created_at, updated_at';

const toUser = (row: UserRow): User => ({
  id: Number(row.id),
  email: row.email,
  passwordHash: row.password_hash,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

@Injectable()
export class PgUserRepository implements UserRepository {
  constructor(private readonly db: DatabaseService) {}

  async findByEmail(email: string): Promise<User | null> {
    const row = await this.db.queryOne<UserRow>(
      `SELECT ${COLUMNS} FROM users WHERE email = $1`,
      [email],
    );
    return row ? toUser(row) : null;
  }

  async findById(id: number): Promise<User | null> {
    const row = await this.db.queryOne<UserRow>(
      `SELECT ${COLUMNS} FROM users WHERE id = $1`,
      [id],
    );
    return row ? toUser(row) : null;
  }

  async create({ email, passwordHash }: CreateUserInput): Promise<User> {
    let row: UserRow | null;
    try {
      row = await this.db.queryOne<UserRow>(
        `INSERT INTO users (email, password_hash)
         VALUES ($1, $2)
         RETURNING ${COLUMNS}`,
        [email, passwordHash],
      );
    } catch (error) {
      if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw ERRORS.EmailAlreadyExists(error);
      }
      throw error;
    }

    if (!row) {
      throw ERRORS.InternalError('INSERT INTO users returned no row');
    }
    return toUser(row);
  }
}

import { ERRORS } from '@/common/exceptions/errors-factory';
import { DatabaseService } from '@/database/database.service';
import { Injectable } from '@nestjs/common';
import { DatabaseError } from 'pg';
import {
  CreateUserProfileInput,
  UserProfile,
} from './types/user-profile.type';

export const USER_PROFILE_REPOSITORY = Symbol('USER_PROFILE_REPOSITORY');

export interface UserProfileRepository {
  findByUserId(userId: number): Promise<UserProfile | null>;
  existsByUsername(username: string): Promise<boolean>;
  /**
   * Rejects with username_already_exists, profile_already_exists or
   * user_not_found when the matching constraint fails.
   */
  create(input: CreateUserProfileInput): Promise<UserProfile>;
}

interface UserProfileRow {
  id: string;
  user_id: string;
  name: string;
  username: string;
  icon_path: string | null;
  created_at: Date;
  updated_at: Date;
}

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';
const USERNAME_CONSTRAINT = 'user_profiles_username_key';
const COLUMNS = 'id, user_id, name, username, icon_path, created_at, updated_at';

const toUserProfile = (row: UserProfileRow): UserProfile => ({
  id: Number(row.id),
  userId: Number(row.user_id),
  name: row.name,
  username: row.username,
  iconPath: row.icon_path,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

@Injectable()
export class PgUserProfileRepository implements UserProfileRepository {
  constructor(private readonly db: DatabaseService) {}

  async findByUserId(userId: number): Promise<UserProfile | null> {
    const row = await this.db.queryOne<UserProfileRow>(
      `SELECT ${COLUMNS} FROM user_profiles WHERE user_id = $1`,
      [userId],
    );
    return row ? toUserProfile(row) : null;
  }

  async existsByUsername(username: string): Promise<boolean> {
    const row = await this.db.queryOne<{ taken: boolean }>(
      'SELECT EXISTS (SELECT 1 FROM user_profiles WHERE username = $1) AS taken',
      [username],
    );
    return row?.taken ?? false;
  }

  async create(input: CreateUserProfileInput): Promise<UserProfile> {
    let row: UserProfileRow | null;
    try {
      row = await this.db.queryOne<UserProfileRow>(
        `INSERT INTO user_profiles (user_id, name, username, icon_path)
         VALUES ($1, $2, $3, $4)
         RETURNING ${COLUMNS}`,
        [input.userId, input.name, input.username, input.iconPath],
      );
    } catch (error) {
      if (error instanceof DatabaseError) {
        if (error.code === UNIQUE_VIOLATION) {
          throw error.constraint === USERNAME_CONSTRAINT
            ? ERRORS.UsernameAlreadyExists(error)
            : ERRORS.ProfileAlreadyExists(error);
        }
        if (error.code === FOREIGN_KEY_VIOLATION) {
          throw ERRORS.UserNotFound(input.userId);
        }
      }
      throw error;
    }

    if (!row) {
      throw ERRORS.InternalError('INSERT INTO user_profiles returned no row');
    }
    return toUserProfile(row);
  }
}

import { Inject, Injectable } from '@nestjs/common';
import { CreateUserInput, User, UserResponse } from './types/user.type';
import { USER_REPOSITORY, UserRepository } from './users.repository';

export const normalizeEmail = (email: string): string =>
  email.trim().toLowerCase();

/**
 * User lookups keyed by normalized email. Every entry point normalizes, so
 * "  Alice@Example.com " and "alice@example.com" are the same account.
 */
@Injectable()
export class UsersService {
  constructor(
    @Inject(USER_REPOSITORY) private readonly users: UserRepository,
  ) {}

  getByEmail(email: string): Promise<User | null> {
    return this.users.findByEmail(normalizeEmail(email));
  }

  getById(id: number): Promise<User | null> {
    return this.users.findById(id);
  }

  create({ email, passwordHash }: CreateUserInput): Promise<User> {
    return this.users.create({ email: normalizeEmail(email), passwordHash });
  }

  toResponse(user: User): UserResponse {
    return {
      id: user.id,
      email: user.email,
      created_at: user.createdAt.toISOString(),
      updated_at: user.updatedAt.toISOString(),
    };
  }
}

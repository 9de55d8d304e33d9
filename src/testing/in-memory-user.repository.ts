import { ERRORS } from '@/common/exceptions/errors-factory';
import { CreateUserInput, User } from '@/modules/users/types/user.type';
import { UserRepository } from '@/modules/users/users.repository';

/** Stand-in for PgUserRepository with the same uniqueness rule on email. */
export class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<number, User>();
  private nextId = 1;

  async findByEmail(email: string): Promise<User | null> {
    for (const user of this.users.values()) {
      if (user.email === email) return user;
    }
    return null;
  }

  async findById(id: number): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async create({ email, passwordHash }: CreateUserInput): Promise<User> {
    if (await this.findByEmail(email)) {
      throw ERRORS.EmailAlreadyExists();
    }

    const now = new Date();
    const user: User = {
      id: this.nextId++,
      email,
      passwordHash,
      createdAt: now,
      updatedAt: now,
    };
    this.users.set(user.id, user);
    return user;
  }

  remove(id: number): void {
    this.users.delete(id);
  }
}

import { ErrorCode } from '@/common/exceptions/error-codes';
import { DatabaseService } from '@/database/database.service';
import { Test, TestingModule } from '@nestjs/testing';
import { DatabaseError } from 'pg';
import { PgUserProfileRepository } from './user-profiles.repository';

describe('PgUserProfileRepository', () => {
  let repository: PgUserProfileRepository;
  const queryOne = jest.fn();

  const input = {
    userId: 7,
    name: 'Alice',
    username: 'alice',
    iconPath: null,
  };

  const violation = (code: string, constraint?: string): DatabaseError => {
    const error = new DatabaseError('constraint violated', 0, 'error');
    error.code = code;
    error.constraint = constraint;
    return error;
  };

  beforeEach(async () => {
    queryOne.mockReset();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PgUserProfileRepository,
        { provide: DatabaseService, useValue: { queryOne } },
      ],
    }).compile();

    repository = module.get<PgUserProfileRepository>(PgUserProfileRepository);
  });

  it('maps rows to profiles with numeric ids', async () => {
    const row = {
      id: '3',
      user_id: '7',
      name: 'Alice',
      username: 'alice',
      icon_path: null,
      created_at: new Date('2026-01-01T00:00:00Z'),
      updated_at: new Date('2026-01-01T00:00:00Z'),
    };
    queryOne.mockResolvedValue(row);

    await expect(repository.findByUserId(7)).resolves.toEqual({
      id: 3,
      userId: 7,
      name: 'Alice',
      username: 'alice',
      iconPath: null,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    });
    expect(queryOne).toHaveBeenCalledWith(
      'SELECT id, user_id, name, username, icon_path, created_at, updated_at FROM user_profiles WHERE user_id = $1',
      [7],
    );
  });

  it('reports whether a username is taken', async () => {
    queryOne.mockResolvedValueOnce({ taken: true });
    queryOne.mockResolvedValueOnce({ taken: false });

    await expect(repository.existsByUsername('alice')).resolves.toBe(true);
    await expect(repository.existsByUsername('bob')).resolves.toBe(false);
    expect(queryOne).toHaveBeenLastCalledWith(
      'SELECT EXISTS (SELECT 1 FROM user_profiles WHERE username = $1) AS taken',
      ['bob'],
    );
  });

  it('maps the username constraint to username_already_exists', async () => {
    const error = violation('23505', 'user_profiles_username_key');
    queryOne.mockRejectedValue(error);

    await expect(repository.create(input)).rejects.toMatchObject({
      code: ErrorCode.UsernameAlreadyExists,
      httpStatusCode: 409,
      originalError: error,
    });
  });

  it('maps the one-profile-per-user constraint to profile_already_exists', async () => {
    queryOne.mockRejectedValue(violation('23505', 'user_profiles_user_id_key'));

    await expect(repository.create(input)).rejects.toMatchObject({
      code: ErrorCode.ProfileAlreadyExists,
    });
  });

  it('maps a missing user to user_not_found', async () => {
    queryOne.mockRejectedValue(violation('23503', 'user_profiles_user_id_fkey'));

    await expect(repository.create(input)).rejects.toMatchObject({
      code: ErrorCode.UserNotFound,
    });
  });

  it('passes other database errors through', async () => {
    const failure = new Error('connection terminated');
    queryOne.mockRejectedValue(failure);

    await expect(repository.create(input)).rejects.toBe(failure);
  });
});

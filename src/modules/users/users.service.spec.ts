import { InMemoryUserRepository } from '@/testing/in-memory-user.repository';
import { Test, TestingModule } from '@nestjs/testing';
import { USER_REPOSITORY } from './users.repository';
import { normalizeEmail, UsersService } from './users.service';

describe('UsersService', () => {
  let service: UsersService;
  let repository: InMemoryUserRepository;

  beforeEach(async () => {
    repository = new InMemoryUserRepository();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: USER_REPOSITORY, useValue: repository },
      ],
    }).compile();

    service = module.get<UsersService>(UsersService);
  });

  it('normalizes emails', () => {
    expect(normalizeEmail('  Alice@Example.COM\t')).toBe('alice@example.com');
  });

  it('creates and looks up users by normalized email', async () => {
    const created = await service.create({
      email: ' Alice@Example.com ',
      passwordHash: 'hash',
    });

    expect(created.email).toBe('alice@example.com');
    await expect(service.getByEmail('ALICE@example.com')).resolves.toEqual(
      created,
    );
    await expect(service.getById(created.id)).resolves.toEqual(created);
    await expect(service.getById(created.id + 1)).resolves.toBeNull();
  });

  it('formats timestamps as RFC 3339', () => {
    const at = new Date('2026-03-04T05:06:07.000Z');

    expect(
      service.toResponse({
        id: 1,
        email: 'alice@example.com',
        passwordHash: 'hash',
        createdAt: at,
        updatedAt: at,
      }),
    ).toEqual({
      id: 1,
      email: 'alice@example.com',
      created_at: '2026-03-04T05:06:07.000Z',
      updated_at: '2026-03-04T05:06:07.000Z',
    });
  });
});

import { IS_PUBLIC_KEY } from '@/common/decorators/public.decorator';
import { HttpStatus, RequestMethod } from '@nestjs/common';
import {
  HTTP_CODE_METADATA,
  METHOD_METADATA,
  PATH_METADATA,
} from '@nestjs/common/constants';
import { Test, TestingModule } from '@nestjs/testing';
import { MeProfileController } from './me-profile.controller';
import { UserProfilesController } from './user-profiles.controller';
import { UserProfilesService } from './user-profiles.service';

describe('profile controllers', () => {
  let meController: MeProfileController;
  let profilesController: UserProfilesController;
  const userProfilesService = {
    create: jest.fn(),
    getByUserId: jest.fn(),
    checkUsername: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [MeProfileController, UserProfilesController],
      providers: [
        { provide: UserProfilesService, useValue: userProfilesService },
      ],
    }).compile();

    meController = module.get<MeProfileController>(MeProfileController);
    profilesController = module.get<UserProfilesController>(
      UserProfilesController,
    );
  });

  describe('MeProfileController', () => {
    it('requires authentication', () => {
      expect(
        Reflect.getMetadata(IS_PUBLIC_KEY, MeProfileController),
      ).toBeUndefined();
      const handler = MeProfileController.prototype.create;
      expect(Reflect.getMetadata(IS_PUBLIC_KEY, handler)).toBeUndefined();
    });

    it('routes POST /me/profile with 201', () => {
      const handler = MeProfileController.prototype.create;

      expect(Reflect.getMetadata(PATH_METADATA, MeProfileController)).toBe(
        'me',
      );
      expect(Reflect.getMetadata(PATH_METADATA, handler)).toBe('profile');
      expect(Reflect.getMetadata(METHOD_METADATA, handler)).toBe(
        RequestMethod.POST,
      );
      expect(Reflect.getMetadata(HTTP_CODE_METADATA, handler)).toBe(
        HttpStatus.CREATED,
      );
    });

    it('creates the profile for the current user', async () => {
      const response = {
        message: 'created',
        user_profile: { id: 1, name: 'Alice', username: 'alice', icon_path: '' },
      };
      userProfilesService.create.mockResolvedValue(response);
      const dto = { name: 'Alice', username: 'alice' };

      await expect(meController.create(7, dto)).resolves.toBe(response);
      expect(userProfilesService.create).toHaveBeenCalledWith(7, dto);
    });

    it('returns the current user profile', async () => {
      const profile = { id: 1, name: 'Alice', username: 'alice', icon_path: '' };
      userProfilesService.getByUserId.mockResolvedValue(profile);

      await expect(meController.get(7)).resolves.toBe(profile);
      expect(userProfilesService.getByUserId).toHaveBeenCalledWith(7);
    });
  });

  describe('UserProfilesController', () => {
    it('routes a public GET /user-profiles/check-username', () => {
      const handler = UserProfilesController.prototype.checkUsername;

      expect(Reflect.getMetadata(PATH_METADATA, UserProfilesController)).toBe(
        'user-profiles',
      );
      expect(Reflect.getMetadata(PATH_METADATA, handler)).toBe('check-username');
      expect(Reflect.getMetadata(METHOD_METADATA, handler)).toBe(
        RequestMethod.GET,
      );
      expect(Reflect.getMetadata(IS_PUBLIC_KEY, handler)).toBe(true);
    });

    it('checks the queried username', async () => {
      userProfilesService.checkUsername.mockResolvedValue({ available: true });

      await expect(
        profilesController.checkUsername({ username: 'alice' }),
      ).resolves.toEqual({ available: true });
      expect(userProfilesService.checkUsername).toHaveBeenCalledWith('alice');
    });
  });
});

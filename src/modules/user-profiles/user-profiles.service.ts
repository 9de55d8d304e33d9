import { ERRORS } from '@/common/exceptions/errors-factory';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { I18nContext, I18nService } from 'nestjs-i18n';
import { CreateUserProfileDto } from './dto/user-profile.dto';
import {
  CreateUserProfileResponse,
  UserProfile,
  UserProfileResponse,
  UsernameAvailabilityResponse,
} from './types/user-profile.type';
import {
  USER_PROFILE_REPOSITORY,
  UserProfileRepository,
} from './user-profiles.repository';

/**
 * One profile per user, with a username unique across all profiles.
 */
@Injectable()
export class UserProfilesService {
  private readonly logger = new Logger(UserProfilesService.name);

  constructor(
    private readonly i18n: I18nService,
    @Inject(USER_PROFILE_REPOSITORY)
    private readonly profiles: UserProfileRepository,
  ) {}

  /**
   * @throws AppError profile_already_exists | username_already_exists |
   *   user_not_found
   */
  async create(
    userId: number,
    dto: CreateUserProfileDto,
  ): Promise<CreateUserProfileResponse> {
    if (await this.profiles.findByUserId(userId)) {
      throw ERRORS.ProfileAlreadyExists();
    }

    const profile = await this.profiles.create({
      userId,
      name: dto.name,
      username: dto.username,
      iconPath: dto.icon_path ? dto.icon_path : null,
    });

    this.logger.log(`User ${userId} created profile @${profile.username}`);

    const message = this.i18n.translate<string, string>(
      'profile.success.created',
      { lang: I18nContext.current()?.lang },
    );

    return { message, user_profile: this.toResponse(profile) };
  }

  /** @throws AppError profile_not_found */
  async getByUserId(userId: number): Promise<UserProfileResponse> {
    const profile = await this.profiles.findByUserId(userId);
    if (!profile) {
      throw ERRORS.ProfileNotFound(userId);
    }
    return this.toResponse(profile);
  }

  async checkUsername(username: string): Promise<UsernameAvailabilityResponse> {
    return { available: !(await this.profiles.existsByUsername(username)) };
  }

  toResponse(profile: UserProfile): UserProfileResponse {
    return {
      id: profile.id,
      name: profile.name,
      username: profile.username,
      icon_path: profile.iconPath ?? '',
    };
  }
}

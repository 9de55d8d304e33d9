import { CurrentUser } from '@/common/decorators/current-user.decorator';
import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { CreateUserProfileDto } from './dto/user-profile.dto';
import {
  CreateUserProfileResponse,
  UserProfileResponse,
} from './types/user-profile.type';
import { UserProfilesService } from './user-profiles.service';

/**
 * The authenticated user's own profile.
 */
@Controller('me')
export class MeProfileController {
  constructor(private readonly userProfilesService: UserProfilesService) {}

  /**
   * POST /me/profile
   */
  @Post('profile')
  @HttpCode(HttpStatus.CREATED)
  create(
    @CurrentUser('id') userId: number,
    @Body() dto: CreateUserProfileDto,
  ): Promise<CreateUserProfileResponse> {
    return this.userProfilesService.create(userId, dto);
  }

  /**
   * GET /me/profile
   */
  @Get('profile')
  get(@CurrentUser('id') userId: number): Promise<UserProfileResponse> {
    return this.userProfilesService.getByUserId(userId);
  }
}

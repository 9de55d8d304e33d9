import { Public } from '@/common/decorators/public.decorator';
import { Controller, Get, Query } from '@nestjs/common';
import { CheckUsernameDto } from './dto/user-profile.dto';
import { UsernameAvailabilityResponse } from './types/user-profile.type';
import { UserProfilesService } from './user-profiles.service';

@Controller('user-profiles')
export class UserProfilesController {
  constructor(private readonly userProfilesService: UserProfilesService) {}

  /**
   * GET /user-profiles/check-username?username=
   *
   * Public. A username is available while no profile uses it.
   */
  @Public()
  @Get('check-username')
  checkUsername(
    @Query() query: CheckUsernameDto,
  ): Promise<UsernameAvailabilityResponse> {
    return this.userProfilesService.checkUsername(query.username);
  }
}

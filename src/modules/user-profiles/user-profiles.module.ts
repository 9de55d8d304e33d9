import { Module } from '@nestjs/common';
import { MeProfileController } from './me-profile.controller';
import { UserProfilesController } from './user-profiles.controller';
import {
  PgUserProfileRepository,
  USER_PROFILE_REPOSITORY,
} from './user-profiles.repository';
import { UserProfilesService } from './user-profiles.service';

@Module({
  controllers: [MeProfileController, UserProfilesController],
  providers: [
    UserProfilesService,
    { provide: USER_PROFILE_REPOSITORY, useClass: PgUserProfileRepository },
  ],
})
export class UserProfilesModule {}

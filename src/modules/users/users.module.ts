import { Module } from '@nestjs/common';
import { UsersController } from './users.controller';
import { PgUserRepository, USER_REPOSITORY } from './users.repository';
import { UsersService } from './users.service';

@Module({
  controllers: [UsersController],
  providers: [
    UsersService,
    { provide: USER_REPOSITORY, useClass: PgUserRepository },
  ],
  exports: [UsersService],
})
export class UsersModule {}

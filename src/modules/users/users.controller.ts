import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { ERRORS } from '@/common/exceptions/errors-factory';
import { Controller, Get } from '@nestjs/common';
import { UserResponse } from './types/user.type';
import { UsersService } from './users.service';

@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  /**
   * GET /users/me
   *
   * Requires a bearer access token. The account may have been removed since
   * the token was issued, which is reported as user_not_found.
   */
  @Get('me')
  async getMe(@CurrentUser('id') userId: number): Promise<UserResponse> {
    const user = await this.usersService.getById(userId);
    if (!user) {
      throw ERRORS.UserNotFound(userId);
    }
    return this.usersService.toResponse(user);
  }
}

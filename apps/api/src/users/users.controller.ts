import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Patch,
} from '@nestjs/common';
import { UserRole } from '@warden/database';
import { RequireRole } from '../auth/decorators/access.decorator';
import { UserProfileDto } from '../auth/dto/user-profile.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { UsersService } from './users.service';

/**
 * UsersController — account administration.
 *
 * Routes (admin only):
 * - GET   /users      → List all accounts
 * - PATCH /users/:id  → Change role, active flag or staff link
 */
@Controller('users')
@RequireRole(UserRole.ADMIN)
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get()
  async list(): Promise<UserProfileDto[]> {
    return this.usersService.list();
  }

  /**
   * @throws 404 Not Found if the account does not exist
   * @throws 422 Unprocessable Entity if the body fails validation
   */
  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateUserDto,
  ): Promise<UserProfileDto> {
    return this.usersService.update(id, dto);
  }
}

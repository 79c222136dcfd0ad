import { Inject, Injectable, Logger } from '@nestjs/common';
import type { User } from '@warden/database';
import { UserProfileDto } from '../auth/dto/user-profile.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { UnknownStaffMemberException } from './exceptions/unknown-staff-member.exception';
import { UserNotFoundException } from './exceptions/user-not-found.exception';
import {
  USER_STORE,
  UnknownStaffMemberError,
  UserChanges,
  UserStore,
} from './user-store';

/**
 * UsersService — administrative reads and the update hook for role,
 * active-status and staff-link changes.
 *
 * Deactivation takes effect on the next request carrying the user's token:
 * the session resolver re-reads `isActive` on every resolution.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @Inject(USER_STORE)
    private readonly userStore: UserStore,
  ) {}

  async list(): Promise<UserProfileDto[]> {
    const users = await this.userStore.list();
    return users.map((user) => UserProfileDto.fromEntity(user));
  }

  /**
   * @throws UserNotFoundException if no user has this id
   * @throws UnknownStaffMemberException if `staffId` names no staff entry
   */
  async update(userId: number, dto: UpdateUserDto): Promise<UserProfileDto> {
    const changes: UserChanges = {};
    if (dto.role !== undefined) changes.role = dto.role;
    if (dto.isActive !== undefined) changes.isActive = dto.isActive;
    if (dto.staffId !== undefined) changes.staffId = dto.staffId;

    let user: User | null;
    try {
      user = await this.userStore.update(userId, changes);
    } catch (error) {
      if (error instanceof UnknownStaffMemberError) {
        throw new UnknownStaffMemberException(error.staffId);
      }
      throw error;
    }

    if (!user) {
      throw new UserNotFoundException(userId);
    }

    this.logger.log(
      `User ${user.id} updated: ${Object.keys(changes).join(', ') || 'no changes'}`,
    );

    return UserProfileDto.fromEntity(user);
  }
}

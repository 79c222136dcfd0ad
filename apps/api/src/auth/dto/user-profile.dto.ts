import type { User, UserRole } from '@warden/database';

/**
 * Public user profile data — never includes passwordHash.
 *
 * Uses a static factory method to enforce that we always map
 * from the entity explicitly, preventing accidental data leaks.
 */
export class UserProfileDto {
  id: number;
  username: string;
  email: string;
  role: UserRole;
  isActive: boolean;
  staffId: number | null;
  createdAt: Date;

  private constructor(user: User) {
    this.id = user.id;
    this.username = user.username;
    this.email = user.email;
    this.role = user.role;
    this.isActive = user.isActive;
    this.staffId = user.staffId ?? null;
    this.createdAt = user.createdAt;
  }

  /**
   * Create a UserProfileDto from a User entity.
   * This is the ONLY way to construct this DTO — ensures passwordHash is never leaked.
   */
  static fromEntity(user: User): UserProfileDto {
    return new UserProfileDto(user);
  }
}

import type { StaffMember } from '@warden/database';

/**
 * Staff directory entry as served by the API.
 *
 * `email` is present only for authenticated callers; anonymous visitors see
 * name, position and photo.
 */
export class StaffMemberDto {
  id: number;
  name: string;
  position: string;
  email?: string;
  photoUrl: string | null;

  private constructor(staff: StaffMember, includeEmail: boolean) {
    this.id = staff.id;
    this.name = staff.name;
    this.position = staff.position;
    this.photoUrl = staff.photoUrl ?? null;
    if (includeEmail) {
      this.email = staff.email;
    }
  }

  static fromEntity(staff: StaffMember, includeEmail: boolean): StaffMemberDto {
    return new StaffMemberDto(staff, includeEmail);
  }
}

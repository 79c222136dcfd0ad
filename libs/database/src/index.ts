// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';
export { StaffMember } from './entities/staff-member.entity';

// ── Enums ───────────────────────────────────────────────────
export { UserRole, isUserRole } from './enums/user-role.enum';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';

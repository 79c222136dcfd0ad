import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';
import { UserRole } from '@warden/database';
import {
  CurrentSession,
  OptionalAuth,
  RequireAnyRole,
  RequireRole,
} from '../auth/decorators';
import type { Session } from '../auth/interfaces';
import { CreateStaffMemberDto } from './dto/create-staff-member.dto';
import { StaffMemberDto } from './dto/staff-member.dto';
import { StaffService } from './staff.service';

/**
 * StaffController — the staff directory.
 *
 * Routes:
 * - GET    /staff      → List entries (anonymous or authenticated)
 * - GET    /staff/:id  → One entry (anonymous or authenticated)
 * - POST   /staff      → Add an entry (admin)
 * - DELETE /staff/:id  → Remove an entry (admin)
 *
 * Reads work for everyone; an authenticated caller also sees email
 * addresses. A bad or expired token on a read is treated as anonymous.
 */
@Controller('staff')
export class StaffController {
  constructor(private readonly staffService: StaffService) {}

  @Get()
  @OptionalAuth()
  async list(
    @CurrentSession() session: Session | null,
  ): Promise<StaffMemberDto[]> {
    const staff = await this.staffService.findAll();
    return staff.map((s) => StaffMemberDto.fromEntity(s, session !== null));
  }

  @Get(':id')
  @OptionalAuth()
  async findOne(
    @Param('id', ParseIntPipe) id: number,
    @CurrentSession() session: Session | null,
  ): Promise<StaffMemberDto> {
    const staff = await this.staffService.findById(id);
    return StaffMemberDto.fromEntity(staff, session !== null);
  }

  @Post()
  @RequireAnyRole(UserRole.ADMIN)
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() dto: CreateStaffMemberDto): Promise<StaffMemberDto> {
    const staff = await this.staffService.create(dto);
    return StaffMemberDto.fromEntity(staff, true);
  }

  @Delete(':id')
  @RequireRole(UserRole.ADMIN)
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.staffService.remove(id);
  }
}

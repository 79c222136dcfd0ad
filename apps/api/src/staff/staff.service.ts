import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { StaffMember } from '@warden/database';
import { CreateStaffMemberDto } from './dto/create-staff-member.dto';
import { StaffMemberNotFoundException } from './exceptions/staff-member-not-found.exception';

/**
 * StaffService — CRUD over the staff directory.
 */
@Injectable()
export class StaffService {
  private readonly logger = new Logger(StaffService.name);

  constructor(
    @InjectRepository(StaffMember)
    private readonly staffRepository: Repository<StaffMember>,
  ) {}

  findAll(): Promise<StaffMember[]> {
    return this.staffRepository.find({ order: { id: 'ASC' } });
  }

  /**
   * @throws StaffMemberNotFoundException if no entry has this id
   */
  async findById(staffId: number): Promise<StaffMember> {
    const staff = await this.staffRepository.findOne({
      where: { id: staffId },
    });
    if (!staff) {
      throw new StaffMemberNotFoundException(staffId);
    }
    return staff;
  }

  async create(dto: CreateStaffMemberDto): Promise<StaffMember> {
    const staff = this.staffRepository.create({
      name: dto.name.trim(),
      position: dto.position.trim(),
      email: dto.email,
      photoUrl: dto.photoUrl ?? null,
    });

    const saved = await this.staffRepository.save(staff);
    this.logger.log(`Staff member created: ${saved.id} (${saved.name})`);
    return saved;
  }

  /**
   * @throws StaffMemberNotFoundException if no entry has this id
   */
  async remove(staffId: number): Promise<void> {
    const result = await this.staffRepository.delete({ id: staffId });
    if (!result.affected) {
      throw new StaffMemberNotFoundException(staffId);
    }
    this.logger.log(`Staff member deleted: ${staffId}`);
  }
}

import { Module } from '@nestjs/common';
import { DatabaseModule } from '@warden/database';
import { StaffService } from './staff.service';
import { StaffController } from './staff.controller';

/**
 * StaffModule — staff directory. Access rules come from the decorators on
 * StaffController, enforced by AuthModule's global SessionGuard.
 */
@Module({
  imports: [DatabaseModule.forFeature()],
  controllers: [StaffController],
  providers: [StaffService],
})
export class StaffModule {}

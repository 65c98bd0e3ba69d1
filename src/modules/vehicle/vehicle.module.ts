import { Module } from '@nestjs/common';
import { FleetService } from './application/fleet.service';

@Module({
  providers: [FleetService],
  exports: [FleetService],
})
export class VehicleModule {}

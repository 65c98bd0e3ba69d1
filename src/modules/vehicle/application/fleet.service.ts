import { Injectable, Logger } from '@nestjs/common';
import { hasEngine, type Vehicle } from '../domain/vehicle';

/**
 * Drives a mixed fleet through the Vehicle contract only.
 */
@Injectable()
export class FleetService {
  private readonly logger = new Logger(FleetService.name);

  accelerateAll(vehicles: readonly Vehicle[]): string[] {
    return vehicles.map((vehicle) => vehicle.accelerate().value);
  }

  /**
   * Starts every vehicle that has an engine; the rest are skipped.
   */
  startEngines(vehicles: readonly Vehicle[]): string[] {
    const started: string[] = [];

    for (const vehicle of vehicles.filter(hasEngine)) {
      const result = vehicle.startEngine();
      if (result.success) {
        started.push(result.value);
      } else {
        this.logger.warn(result.error.message);
      }
    }

    return started;
  }
}

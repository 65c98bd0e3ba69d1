import type { NoEngineError } from '../../../shared/domain/errors';
import type { Result, Success } from '../../../shared/domain/result';

/**
 * What every vehicle can do. Substituting any Vehicle for another never
 * changes the possible outcomes of these calls.
 */
export interface Vehicle {
  readonly model: string;
  accelerate(): Success<string>;
}

/**
 * Vehicles with a combustion engine.
 *
 * Engine start lives here rather than on Vehicle: an electric model would
 * otherwise have to implement it as a call that always fails.
 */
export interface EngineVehicle extends Vehicle {
  startEngine(): Result<string, NoEngineError>;
}

export function hasEngine(vehicle: Vehicle): vehicle is EngineVehicle {
  return 'startEngine' in vehicle && typeof vehicle.startEngine === 'function';
}

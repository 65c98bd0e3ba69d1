import type { NoEngineError } from '../../../shared/domain/errors';
import { ok, type Result, type Success } from '../../../shared/domain/result';
import type { EngineVehicle, Vehicle } from './vehicle';

export class Gol implements EngineVehicle {
  readonly model = 'Gol';

  startEngine(): Result<string, NoEngineError> {
    return ok(`${this.model} engine started`);
  }

  accelerate(): Success<string> {
    return ok(`${this.model} is accelerating`);
  }
}

export class Byd implements Vehicle {
  readonly model = 'Byd';

  accelerate(): Success<string> {
    return ok(`${this.model} is accelerating quietly`);
  }
}

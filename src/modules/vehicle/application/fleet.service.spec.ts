import { describe, it, expect } from 'vitest';
import { FleetService } from './fleet.service';
import { Byd, Gol } from '../domain/models';
import { hasEngine, type EngineVehicle, type Vehicle } from '../domain/vehicle';
import { NoEngineError } from '../../../shared/domain/errors';
import { fail, ok } from '../../../shared/domain/result';

describe('FleetService', () => {
  const fleet = new FleetService();

  describe('accelerateAll', () => {
    it('should accelerate every kind of vehicle', () => {
      expect(fleet.accelerateAll([new Gol(), new Byd()])).toEqual([
        'Gol is accelerating',
        'Byd is accelerating quietly',
      ]);
    });

    it('should return an empty list for an empty fleet', () => {
      expect(fleet.accelerateAll([])).toEqual([]);
    });
  });

  describe('startEngines', () => {
    it('should start only vehicles that have an engine', () => {
      expect(fleet.startEngines([new Byd(), new Gol()])).toEqual([
        'Gol engine started',
      ]);
    });

    it('should skip an engine that fails to start', () => {
      const stalled: EngineVehicle = {
        model: 'Stalled',
        accelerate: () => ok('Stalled is accelerating'),
        startEngine: () => fail(new NoEngineError('Stalled')),
      };

      expect(fleet.startEngines([stalled, new Gol()])).toEqual([
        'Gol engine started',
      ]);
    });
  });
});

describe('hasEngine', () => {
  it('should tell engine vehicles from electric ones', () => {
    const vehicles: Vehicle[] = [new Gol(), new Byd()];

    expect(vehicles.map(hasEngine)).toEqual([true, false]);
  });
});

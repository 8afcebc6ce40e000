import { describe, it, expect } from 'vitest';
import {
  AtmosphereDomainError,
  strict,
  validateAtmosConditions,
} from '@physics/DomainValidation';
import {
  conditions,
  pressure,
  speedOfSound,
  temperature,
  vcasToVtas,
  transitionAltitude,
} from '@physics';

function captureDomainError(fn: () => unknown): AtmosphereDomainError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AtmosphereDomainError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected an AtmosphereDomainError');
}

describe('AtmosphereDomainError', () => {
  it('should carry the failing operation, parameter and value', () => {
    const error = captureDomainError(() => strict.speedOfSound(-5));
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('AtmosphereDomainError');
    expect(error.operation).toBe('speedOfSound');
    expect(error.parameter).toBe('temperature');
    expect(error.value).toBe(-5);
    expect(error.message).toBe('speedOfSound: temperature must be greater than zero (got -5)');
  });
});

describe('strict', () => {
  it('should return the permissive results for valid input', () => {
    expect(strict.temperature(9000, -1.5)).toBe(temperature(9000, -1.5));
    expect(strict.pressure(13000)).toBe(pressure(13000));
    expect(strict.speedOfSound(228.15)).toBe(speedOfSound(228.15));
    expect(strict.conditions(9000, -1.5)).toEqual(conditions(9000, -1.5));
    expect(strict.vcasToVtas(128.611, conditions(9000))).toBe(vcasToVtas(128.611, conditions(9000)));
    expect(strict.transitionAltitude(133.756, 0.8)).toBe(transitionAltitude(133.756, 0.8));
  });

  it('should reject non-finite altitudes', () => {
    const error = captureDomainError(() => strict.pressure(Number.NaN));
    expect(error.operation).toBe('pressure');
    expect(error.parameter).toBe('altitude');
    expect(error.message).toBe('pressure: altitude must be a finite number (got NaN)');
  });

  it('should reject an offset that drives the temperature below absolute zero', () => {
    const error = captureDomainError(() => strict.temperature(9000, -300));
    expect(error.parameter).toBe('temperatureOffset');
    expect(error.value).toBe(-300);

    // 216.65 K at and above the tropopause
    expect(() => strict.conditions(15000, -216.65)).toThrow(AtmosphereDomainError);
    expect(strict.conditions(15000, -200).temperature).toBeCloseTo(16.65, 6);
  });

  it('should accept any finite offset for pressure', () => {
    expect(strict.pressure(9000, -300)).toBe(pressure(9000, -300));
    expect(strict.pressure(9000, -300)).toBeCloseTo(30742.43, 1);
    expect(() => strict.pressure(9000, Number.NaN)).toThrow(AtmosphereDomainError);
  });

  it('should reject non-positive pressure and temperature', () => {
    expect(() => strict.density(0, 288.15)).toThrow(AtmosphereDomainError);
    expect(() => strict.density(101325, -1)).toThrow(AtmosphereDomainError);
    expect(() => strict.pressureAltitude(-1)).toThrow(AtmosphereDomainError);
    expect(() => strict.delta(0)).toThrow(AtmosphereDomainError);
    expect(() => strict.theta(-273)).toThrow(AtmosphereDomainError);
    expect(() => strict.sigma(Infinity)).toThrow(AtmosphereDomainError);
  });

  it('should reject negative airspeeds and Mach numbers', () => {
    const atm = conditions(9000);
    const error = captureDomainError(() => strict.vcasToVtas(-1, atm));
    expect(error.operation).toBe('vcasToVtas');
    expect(error.parameter).toBe('vcas');

    expect(() => strict.vtasToVcas(-1, atm.pressure, atm.temperature)).toThrow(AtmosphereDomainError);
    expect(() => strict.machToVtas(-0.1, atm)).toThrow(AtmosphereDomainError);
    expect(() => strict.vtasToMach(-200, atm.temperature)).toThrow(AtmosphereDomainError);
    expect(() => strict.machToVcas(-0.5, atm)).toThrow(AtmosphereDomainError);
    expect(() => strict.vcasToMach(-120, atm)).toThrow(AtmosphereDomainError);
  });

  it('should accept zero airspeed', () => {
    expect(strict.vcasToVtas(0, conditions(9000))).toBe(0);
    expect(strict.machToVtas(0, 250)).toBe(0);
  });

  it('should check the raw pressure and temperature pair', () => {
    const error = captureDomainError(() => strict.vcasToMach(120, 30000, 0));
    expect(error.operation).toBe('vcasToMach');
    expect(error.parameter).toBe('temperature');
    expect(error.value).toBe(0);
  });

  it('should check every field of a snapshot', () => {
    const broken = { ...conditions(9000), density: -1 };
    const error = captureDomainError(() => strict.machToVcas(0.7, broken));
    expect(error.operation).toBe('machToVcas');
    expect(error.parameter).toBe('density');
  });

  it('should require a positive CAS and Mach for the transition altitude', () => {
    expect(() => strict.transitionAltitude(133.756, 0)).toThrow(AtmosphereDomainError);
    expect(() => strict.transitionAltitude(0, 0.8)).toThrow(AtmosphereDomainError);
    expect(() => strict.transitionAltitude(133.756, 0.8, Number.NaN)).toThrow(AtmosphereDomainError);
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(strict)).toBe(true);
  });
});

describe('validateAtmosConditions', () => {
  it('should accept snapshots built by conditions()', () => {
    expect(() => validateAtmosConditions(conditions(0))).not.toThrow();
    expect(() => validateAtmosConditions(conditions(20000, 10))).not.toThrow();
  });

  it('should report the operation it checks for', () => {
    const error = captureDomainError(() =>
      validateAtmosConditions({ ...conditions(0), speedOfSound: Number.NaN }, 'climb')
    );
    expect(error.operation).toBe('climb');
    expect(error.parameter).toBe('speedOfSound');
  });

  it('should default the operation name', () => {
    const error = captureDomainError(() => validateAtmosConditions({ ...conditions(0), altitude: Infinity }));
    expect(error.operation).toBe('conditions');
    expect(error.parameter).toBe('altitude');
  });
});

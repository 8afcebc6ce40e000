/**
 * Physics Module - Standard Atmosphere and Airspeeds
 *
 * ISA temperature, pressure, density and speed of sound as functions of
 * geopotential pressure altitude, plus CAS/TAS/Mach conversions.
 */

// ISA constants
export * from './AtmosphereConstants';

// Atmosphere model
export {
    temperature,
    pressure,
    density,
    speedOfSound,
    conditions,
    pressureAltitude,
    theta,
    delta,
    sigma,
} from './Atmosphere';
export type { AtmosConditions } from './Atmosphere';

// Airspeed conversions
export {
    vcasToVtas,
    vtasToVcas,
    machToVtas,
    vtasToMach,
    machToVcas,
    vcasToMach,
    transitionAltitude,
} from './Airspeed';

// Checked variants
export { AtmosphereDomainError, strict, validateAtmosConditions } from './DomainValidation';
export type { StrictAtmosphere } from './DomainValidation';

// Configured facade
export { StandardAtmosphere } from './StandardAtmosphere';
export type { AtmosphereConfig, ValidationMode } from './StandardAtmosphere';

/**
 * Quick Start Example:
 *
 * ```typescript
 * import { conditions, vcasToVtas, transitionAltitude } from './physics';
 *
 * // ISA -1.5 K at 9000 m
 * const atm = conditions(9000, -1.5);
 * console.log(`T: ${atm.temperature}K, p: ${atm.pressure}Pa`);
 *
 * // 250 kt CAS as true airspeed
 * const tas = vcasToVtas(128.611, atm);
 *
 * // Crossover between 260 kt CAS and Mach 0.8
 * const crossover = transitionAltitude(133.756, 0.8);
 * ```
 */

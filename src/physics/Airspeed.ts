/**
 * Airspeed conversions between calibrated airspeed (CAS), true airspeed (TAS)
 * and Mach number, using the compressible-flow relations.
 *
 * Source: EUROCONTROL BADA 4 User Manual eq. 2.2-23 to 2.2-29
 *
 * Each conversion takes either the raw (pressure, temperature) pair or an
 * AtmosConditions snapshot.
 */
import {
    ADIABATIC_INDEX,
    GAS_CONSTANT,
    GRAVITY,
    MU,
    SEA_LEVEL_DENSITY,
    SEA_LEVEL_PRESSURE,
    SEA_LEVEL_SPEED_OF_SOUND,
    SEA_LEVEL_TEMPERATURE,
    TEMPERATURE_LAPSE_RATE,
} from './AtmosphereConstants';
import { density, speedOfSound } from './Atmosphere';
import type { AtmosConditions } from './Atmosphere';

/**
 * Calibrated to true airspeed
 * @param vcas Calibrated airspeed in m/s
 * @param pressure Static pressure in Pascals
 * @param temperature Static temperature in Kelvin
 * @returns True airspeed in m/s
 */
export function vcasToVtas(vcas: number, pressure: number, temperature: number): number;
export function vcasToVtas(vcas: number, conditions: AtmosConditions): number;
export function vcasToVtas(
    vcas: number,
    pressureOrConditions: number | AtmosConditions,
    temperature?: number
): number {
    const [p, T] = resolvePressureTemperature(pressureOrConditions, temperature);
    const rho = density(p, T);

    const impact = Math.pow(1 + MU * SEA_LEVEL_DENSITY / (2 * SEA_LEVEL_PRESSURE) * vcas * vcas, 1 / MU) - 1;
    return Math.sqrt(2 * p / (MU * rho) * (Math.pow(1 + SEA_LEVEL_PRESSURE / p * impact, MU) - 1));
}

/**
 * True to calibrated airspeed
 * @param vtas True airspeed in m/s
 * @param pressure Static pressure in Pascals
 * @param temperature Static temperature in Kelvin
 * @returns Calibrated airspeed in m/s
 */
export function vtasToVcas(vtas: number, pressure: number, temperature: number): number;
export function vtasToVcas(vtas: number, conditions: AtmosConditions): number;
export function vtasToVcas(
    vtas: number,
    pressureOrConditions: number | AtmosConditions,
    temperature?: number
): number {
    const [p, T] = resolvePressureTemperature(pressureOrConditions, temperature);
    const rho = density(p, T);

    const impact = Math.pow(1 + MU * rho / (2 * p) * vtas * vtas, 1 / MU) - 1;
    return Math.sqrt(
        2 * SEA_LEVEL_PRESSURE / (MU * SEA_LEVEL_DENSITY) *
        (Math.pow(1 + p / SEA_LEVEL_PRESSURE * impact, MU) - 1)
    );
}

/**
 * Mach number to true airspeed. The snapshot overload reuses its speed of sound.
 * @returns True airspeed in m/s
 */
export function machToVtas(mach: number, temperature: number): number;
export function machToVtas(mach: number, conditions: AtmosConditions): number;
export function machToVtas(mach: number, temperatureOrConditions: number | AtmosConditions): number {
    if (typeof temperatureOrConditions === 'number') {
        return mach * speedOfSound(temperatureOrConditions);
    }
    return mach * temperatureOrConditions.speedOfSound;
}

/**
 * True airspeed to Mach number. The snapshot overload reuses its speed of sound.
 */
export function vtasToMach(vtas: number, temperature: number): number;
export function vtasToMach(vtas: number, conditions: AtmosConditions): number;
export function vtasToMach(vtas: number, temperatureOrConditions: number | AtmosConditions): number {
    if (typeof temperatureOrConditions === 'number') {
        return vtas / speedOfSound(temperatureOrConditions);
    }
    return vtas / temperatureOrConditions.speedOfSound;
}

/**
 * Mach number to calibrated airspeed, through TAS
 * @returns Calibrated airspeed in m/s
 */
export function machToVcas(mach: number, pressure: number, temperature: number): number;
export function machToVcas(mach: number, conditions: AtmosConditions): number;
export function machToVcas(
    mach: number,
    pressureOrConditions: number | AtmosConditions,
    temperature?: number
): number {
    const [p, T] = resolvePressureTemperature(pressureOrConditions, temperature);
    return vtasToVcas(machToVtas(mach, T), p, T);
}

/**
 * Calibrated airspeed to Mach number, through TAS
 */
export function vcasToMach(vcas: number, pressure: number, temperature: number): number;
export function vcasToMach(vcas: number, conditions: AtmosConditions): number;
export function vcasToMach(
    vcas: number,
    pressureOrConditions: number | AtmosConditions,
    temperature?: number
): number {
    const [p, T] = resolvePressureTemperature(pressureOrConditions, temperature);
    return vtasToMach(vcasToVtas(vcas, p, T), T);
}

/**
 * Transition (crossover) altitude: the pressure altitude where a calibrated
 * airspeed and a Mach number give the same true airspeed.
 *
 * Closed form under the troposphere lapse-rate model; the result is not
 * checked against the tropopause. Pressure altitude does not depend on the
 * temperature offset here, so neither does the result.
 *
 * @param vcas Calibrated airspeed in m/s
 * @param mach Mach number
 * @param temperatureOffset Deviation from the standard day in Kelvin
 * @returns Geopotential pressure altitude in meters
 */
export function transitionAltitude(vcas: number, mach: number, temperatureOffset: number = 0): number {
    const k = (ADIABATIC_INDEX - 1) / 2;
    const casRatio = vcas / SEA_LEVEL_SPEED_OF_SOUND;

    const deltaTrans = (Math.pow(1 + k * casRatio * casRatio, 1 / MU) - 1) /
                       (Math.pow(1 + k * mach * mach, 1 / MU) - 1);
    const thetaTrans = Math.pow(deltaTrans, -TEMPERATURE_LAPSE_RATE * GAS_CONSTANT / GRAVITY);

    return SEA_LEVEL_TEMPERATURE / TEMPERATURE_LAPSE_RATE * (thetaTrans - 1);
}

function resolvePressureTemperature(
    pressureOrConditions: number | AtmosConditions,
    temperature: number | undefined
): [number, number] {
    if (typeof pressureOrConditions === 'number') {
        // Only reachable through the (value, pressure, temperature) overload
        return [pressureOrConditions, temperature ?? Number.NaN];
    }
    return [pressureOrConditions.pressure, pressureOrConditions.temperature];
}

/**
 * International Standard Atmosphere (ISA) Model
 * Atmospheric properties as closed-form functions of geopotential pressure altitude.
 *
 * Source: EUROCONTROL BADA 4 User Manual, section 2.2 (Atmosphere Model)
 *
 * Every function is pure. Inputs outside the physical domain are not rejected:
 * they propagate as NaN or Infinity. See DomainValidation for the checked variants.
 */
import {
    GAS_CONSTANT,
    GRAVITY,
    ADIABATIC_INDEX,
    SEA_LEVEL_DENSITY,
    SEA_LEVEL_PRESSURE,
    SEA_LEVEL_TEMPERATURE,
    TEMPERATURE_LAPSE_RATE,
    TROPOPAUSE_ALTITUDE,
} from './AtmosphereConstants';

// Exponent of the troposphere pressure/temperature power law
const PRESSURE_EXPONENT = -GRAVITY / (TEMPERATURE_LAPSE_RATE * GAS_CONSTANT);

/**
 * Immutable snapshot of the atmosphere at one altitude and temperature offset
 */
export interface AtmosConditions {
    readonly altitude: number;          // Geopotential pressure altitude (m)
    readonly temperatureOffset: number; // ISA deviation used to build the snapshot (K)
    readonly temperature: number;       // K
    readonly pressure: number;          // Pa
    readonly density: number;           // kg/m³
    readonly speedOfSound: number;      // m/s
}

/**
 * Calculate temperature at altitude
 * Above the tropopause the temperature stays at its tropopause value.
 * @param altitude Geopotential pressure altitude in meters
 * @param temperatureOffset Deviation from the standard day in Kelvin
 * @returns Temperature in Kelvin
 */
export function temperature(altitude: number, temperatureOffset: number = 0): number {
    if (altitude <= TROPOPAUSE_ALTITUDE) {
        return SEA_LEVEL_TEMPERATURE + temperatureOffset + TEMPERATURE_LAPSE_RATE * altitude;
    }
    return SEA_LEVEL_TEMPERATURE + temperatureOffset + TEMPERATURE_LAPSE_RATE * TROPOPAUSE_ALTITUDE;
}

/**
 * Calculate pressure at altitude using the barometric formula
 *
 * The temperature ratio driving the troposphere power law is formed from the
 * lapse-rate profile only: the offset is taken back out of temperature().
 * Above the tropopause the isothermal layer uses the standard tropopause temperature.
 *
 * @param altitude Geopotential pressure altitude in meters
 * @param temperatureOffset Deviation from the standard day in Kelvin
 * @returns Pressure in Pascals
 */
export function pressure(altitude: number, temperatureOffset: number = 0): number {
    if (altitude <= TROPOPAUSE_ALTITUDE) {
        const tempRatio = (temperature(altitude, temperatureOffset) - temperatureOffset) /
                          SEA_LEVEL_TEMPERATURE;
        return SEA_LEVEL_PRESSURE * Math.pow(tempRatio, PRESSURE_EXPONENT);
    }

    const tropoRatio = (temperature(TROPOPAUSE_ALTITUDE, temperatureOffset) - temperatureOffset) /
                       SEA_LEVEL_TEMPERATURE;
    const tropoPressure = SEA_LEVEL_PRESSURE * Math.pow(tropoRatio, PRESSURE_EXPONENT);
    const exponent = -GRAVITY / (GAS_CONSTANT * temperature(TROPOPAUSE_ALTITUDE)) *
                     (altitude - TROPOPAUSE_ALTITUDE);
    return tropoPressure * Math.exp(exponent);
}

/**
 * Ideal gas law: ρ = p / (R * T)
 * @returns Density in kg/m³
 */
export function density(pressure: number, temperature: number): number {
    return pressure / (GAS_CONSTANT * temperature);
}

/**
 * a = sqrt(κ * R * T). Negative temperatures give NaN.
 * @returns Speed of sound in m/s
 */
export function speedOfSound(temperature: number): number {
    return Math.sqrt(ADIABATIC_INDEX * GAS_CONSTANT * temperature);
}

/**
 * Get all atmospheric properties at altitude
 * @param altitude Geopotential pressure altitude in meters
 * @param temperatureOffset Deviation from the standard day in Kelvin
 */
export function conditions(altitude: number, temperatureOffset: number = 0): AtmosConditions {
    const T = temperature(altitude, temperatureOffset);
    const p = pressure(altitude, temperatureOffset);

    return Object.freeze({
        altitude,
        temperatureOffset,
        temperature: T,
        pressure: p,
        density: density(p, T),
        speedOfSound: speedOfSound(T),
    });
}

/**
 * Calculate pressure altitude from static pressure (inverse of pressure())
 * Pressure altitude does not depend on the temperature offset in this model.
 * @param pressure Pressure in Pascals
 * @returns Geopotential pressure altitude in meters
 */
export function pressureAltitude(pressure: number): number {
    const tropoPressure = SEA_LEVEL_PRESSURE *
                          Math.pow(temperature(TROPOPAUSE_ALTITUDE) / SEA_LEVEL_TEMPERATURE, PRESSURE_EXPONENT);

    if (pressure >= tropoPressure) {
        const tempRatio = Math.pow(pressure / SEA_LEVEL_PRESSURE, 1 / PRESSURE_EXPONENT);
        return SEA_LEVEL_TEMPERATURE / TEMPERATURE_LAPSE_RATE * (tempRatio - 1);
    }

    return TROPOPAUSE_ALTITUDE -
           GAS_CONSTANT * temperature(TROPOPAUSE_ALTITUDE) / GRAVITY * Math.log(pressure / tropoPressure);
}

/** Temperature ratio θ = T / T₀ */
export function theta(temperature: number): number {
    return temperature / SEA_LEVEL_TEMPERATURE;
}

/** Pressure ratio δ = p / p₀ */
export function delta(pressure: number): number {
    return pressure / SEA_LEVEL_PRESSURE;
}

/** Density ratio σ = ρ / ρ₀ */
export function sigma(density: number): number {
    return density / SEA_LEVEL_DENSITY;
}

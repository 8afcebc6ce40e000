/**
 * International Standard Atmosphere (ISA) constants
 * Values from EUROCONTROL BADA 4 User Manual, section 2.2.1/2.2.2
 */

export const SEA_LEVEL_TEMPERATURE = 288.15; // K (15°C)
export const SEA_LEVEL_PRESSURE = 101325; // Pa
export const SEA_LEVEL_DENSITY = 1.225; // kg/m³
export const SEA_LEVEL_SPEED_OF_SOUND = 340.294; // m/s

// Adiabatic index (ratio of specific heats) of air
export const ADIABATIC_INDEX = 1.4;

// (κ - 1) / κ, used by the CAS/TAS relations
export const MU = (ADIABATIC_INDEX - 1) / ADIABATIC_INDEX;

export const GAS_CONSTANT = 287.05287; // m²/(K·s²)
export const GRAVITY = 9.80665; // m/s²
export const TEMPERATURE_LAPSE_RATE = -0.0065; // K/m, below the tropopause
export const TROPOPAUSE_ALTITUDE = 11000; // m, geopotential pressure altitude

export const ISA = Object.freeze({
    SEA_LEVEL_TEMPERATURE,
    SEA_LEVEL_PRESSURE,
    SEA_LEVEL_DENSITY,
    SEA_LEVEL_SPEED_OF_SOUND,
    ADIABATIC_INDEX,
    MU,
    GAS_CONSTANT,
    GRAVITY,
    TEMPERATURE_LAPSE_RATE,
    TROPOPAUSE_ALTITUDE,
} as const);

export type IsaConstants = typeof ISA;

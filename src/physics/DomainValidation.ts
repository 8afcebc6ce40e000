/**
 * Checked variants of the atmosphere and airspeed functions
 *
 * The plain functions let out-of-domain inputs run into NaN or Infinity.
 * The wrappers here reject such inputs before anything is computed.
 */
import {
    SEA_LEVEL_TEMPERATURE,
    TEMPERATURE_LAPSE_RATE,
    TROPOPAUSE_ALTITUDE,
} from './AtmosphereConstants';
import * as atmosphere from './Atmosphere';
import * as airspeed from './Airspeed';
import type { AtmosConditions } from './Atmosphere';

export class AtmosphereDomainError extends Error {
    constructor(
        public readonly operation: string,
        public readonly parameter: string,
        public readonly value: number,
        reason: string
    ) {
        super(`${operation}: ${parameter} ${reason} (got ${value})`);
        this.name = 'AtmosphereDomainError';
    }
}

function requireFinite(operation: string, parameter: string, value: number): void {
    if (!Number.isFinite(value)) {
        throw new AtmosphereDomainError(operation, parameter, value, 'must be a finite number');
    }
}

function requirePositive(operation: string, parameter: string, value: number): void {
    requireFinite(operation, parameter, value);
    if (value <= 0) {
        throw new AtmosphereDomainError(operation, parameter, value, 'must be greater than zero');
    }
}

function requireNonNegative(operation: string, parameter: string, value: number): void {
    requireFinite(operation, parameter, value);
    if (value < 0) {
        throw new AtmosphereDomainError(operation, parameter, value, 'must not be negative');
    }
}

function requireAltitude(operation: string, altitude: number, temperatureOffset: number): void {
    requireFinite(operation, 'altitude', altitude);
    requireFinite(operation, 'temperatureOffset', temperatureOffset);

    // Lapse-rate profile is positive for every finite altitude; only the offset can drive T below zero
    const lapseTemperature = SEA_LEVEL_TEMPERATURE +
                             TEMPERATURE_LAPSE_RATE * Math.min(altitude, TROPOPAUSE_ALTITUDE);

    if (lapseTemperature + temperatureOffset <= 0) {
        throw new AtmosphereDomainError(
            operation,
            'temperatureOffset',
            temperatureOffset,
            'gives a non-positive absolute temperature'
        );
    }
}

function requireState(
    operation: string,
    pressureOrConditions: number | AtmosConditions,
    temperature: number | undefined
): [number, number] {
    if (typeof pressureOrConditions === 'number') {
        requirePositive(operation, 'pressure', pressureOrConditions);
        requirePositive(operation, 'temperature', temperature ?? Number.NaN);
        return [pressureOrConditions, temperature ?? Number.NaN];
    }
    validateAtmosConditions(pressureOrConditions, operation);
    return [pressureOrConditions.pressure, pressureOrConditions.temperature];
}

/**
 * Check that a snapshot describes a physical atmosphere
 */
export function validateAtmosConditions(conditions: AtmosConditions, operation = 'conditions'): void {
    requireFinite(operation, 'altitude', conditions.altitude);
    requireFinite(operation, 'temperatureOffset', conditions.temperatureOffset);
    requirePositive(operation, 'temperature', conditions.temperature);
    requirePositive(operation, 'pressure', conditions.pressure);
    requirePositive(operation, 'density', conditions.density);
    requirePositive(operation, 'speedOfSound', conditions.speedOfSound);
}

function temperature(altitude: number, temperatureOffset: number = 0): number {
    requireAltitude('temperature', altitude, temperatureOffset);
    return atmosphere.temperature(altitude, temperatureOffset);
}

function pressure(altitude: number, temperatureOffset: number = 0): number {
    // the offset cancels out of the pressure ratio
    requireFinite('pressure', 'altitude', altitude);
    requireFinite('pressure', 'temperatureOffset', temperatureOffset);
    return atmosphere.pressure(altitude, temperatureOffset);
}

function density(pressure: number, temperature: number): number {
    requirePositive('density', 'pressure', pressure);
    requirePositive('density', 'temperature', temperature);
    return atmosphere.density(pressure, temperature);
}

function speedOfSound(temperature: number): number {
    requirePositive('speedOfSound', 'temperature', temperature);
    return atmosphere.speedOfSound(temperature);
}

function conditions(altitude: number, temperatureOffset: number = 0): AtmosConditions {
    requireAltitude('conditions', altitude, temperatureOffset);
    return atmosphere.conditions(altitude, temperatureOffset);
}

function pressureAltitude(pressure: number): number {
    requirePositive('pressureAltitude', 'pressure', pressure);
    return atmosphere.pressureAltitude(pressure);
}

function theta(temperature: number): number {
    requirePositive('theta', 'temperature', temperature);
    return atmosphere.theta(temperature);
}

function delta(pressure: number): number {
    requirePositive('delta', 'pressure', pressure);
    return atmosphere.delta(pressure);
}

function sigma(density: number): number {
    requirePositive('sigma', 'density', density);
    return atmosphere.sigma(density);
}

function vcasToVtas(vcas: number, pressure: number, temperature: number): number;
function vcasToVtas(vcas: number, conditions: AtmosConditions): number;
function vcasToVtas(vcas: number, pressureOrConditions: number | AtmosConditions, temperature?: number): number {
    requireNonNegative('vcasToVtas', 'vcas', vcas);
    const [p, T] = requireState('vcasToVtas', pressureOrConditions, temperature);
    return airspeed.vcasToVtas(vcas, p, T);
}

function vtasToVcas(vtas: number, pressure: number, temperature: number): number;
function vtasToVcas(vtas: number, conditions: AtmosConditions): number;
function vtasToVcas(vtas: number, pressureOrConditions: number | AtmosConditions, temperature?: number): number {
    requireNonNegative('vtasToVcas', 'vtas', vtas);
    const [p, T] = requireState('vtasToVcas', pressureOrConditions, temperature);
    return airspeed.vtasToVcas(vtas, p, T);
}

function machToVcas(mach: number, pressure: number, temperature: number): number;
function machToVcas(mach: number, conditions: AtmosConditions): number;
function machToVcas(mach: number, pressureOrConditions: number | AtmosConditions, temperature?: number): number {
    requireNonNegative('machToVcas', 'mach', mach);
    const [p, T] = requireState('machToVcas', pressureOrConditions, temperature);
    return airspeed.machToVcas(mach, p, T);
}

function vcasToMach(vcas: number, pressure: number, temperature: number): number;
function vcasToMach(vcas: number, conditions: AtmosConditions): number;
function vcasToMach(vcas: number, pressureOrConditions: number | AtmosConditions, temperature?: number): number {
    requireNonNegative('vcasToMach', 'vcas', vcas);
    const [p, T] = requireState('vcasToMach', pressureOrConditions, temperature);
    return airspeed.vcasToMach(vcas, p, T);
}

function machToVtas(mach: number, temperature: number): number;
function machToVtas(mach: number, conditions: AtmosConditions): number;
function machToVtas(mach: number, temperatureOrConditions: number | AtmosConditions): number {
    requireNonNegative('machToVtas', 'mach', mach);
    if (typeof temperatureOrConditions === 'number') {
        requirePositive('machToVtas', 'temperature', temperatureOrConditions);
        return airspeed.machToVtas(mach, temperatureOrConditions);
    }
    validateAtmosConditions(temperatureOrConditions, 'machToVtas');
    return airspeed.machToVtas(mach, temperatureOrConditions);
}

function vtasToMach(vtas: number, temperature: number): number;
function vtasToMach(vtas: number, conditions: AtmosConditions): number;
function vtasToMach(vtas: number, temperatureOrConditions: number | AtmosConditions): number {
    requireNonNegative('vtasToMach', 'vtas', vtas);
    if (typeof temperatureOrConditions === 'number') {
        requirePositive('vtasToMach', 'temperature', temperatureOrConditions);
        return airspeed.vtasToMach(vtas, temperatureOrConditions);
    }
    validateAtmosConditions(temperatureOrConditions, 'vtasToMach');
    return airspeed.vtasToMach(vtas, temperatureOrConditions);
}

function transitionAltitude(vcas: number, mach: number, temperatureOffset: number = 0): number {
    requirePositive('transitionAltitude', 'vcas', vcas);
    requirePositive('transitionAltitude', 'mach', mach);
    requireFinite('transitionAltitude', 'temperatureOffset', temperatureOffset);
    return airspeed.transitionAltitude(vcas, mach, temperatureOffset);
}

/**
 * Same operations as Atmosphere and Airspeed, throwing AtmosphereDomainError
 * on physically meaningless input
 */
export const strict = Object.freeze({
    temperature,
    pressure,
    density,
    speedOfSound,
    conditions,
    pressureAltitude,
    theta,
    delta,
    sigma,
    vcasToVtas,
    vtasToVcas,
    machToVtas,
    vtasToMach,
    machToVcas,
    vcasToMach,
    transitionAltitude,
});

export type StrictAtmosphere = typeof strict;

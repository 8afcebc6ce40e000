import * as atmosphere from './Atmosphere';
import * as airspeed from './Airspeed';
import { AtmosphereDomainError, strict } from './DomainValidation';
import type { AtmosConditions } from './Atmosphere';

/**
 * How out-of-domain inputs are treated
 * - permissive: computed as-is, may return NaN or Infinity
 * - warn: computed as-is, logged through console.warn
 * - strict: AtmosphereDomainError is thrown
 */
export type ValidationMode = 'permissive' | 'warn' | 'strict';

export interface AtmosphereConfig {
    temperatureOffset: number; // ISA deviation (K)
    validation: ValidationMode;
}

/**
 * Standard atmosphere evaluated with one fixed ISA deviation
 *
 * Holds no mutable state: a different offset or validation mode needs a new instance.
 */
export class StandardAtmosphere {
    private readonly config: Readonly<AtmosphereConfig>;

    constructor(config?: Partial<AtmosphereConfig>) {
        this.config = Object.freeze({ ...StandardAtmosphere.getDefaultConfig(), ...config });
    }

    static getDefaultConfig(): AtmosphereConfig {
        return {
            temperatureOffset: 0,
            validation: 'permissive',
        };
    }

    get temperatureOffset(): number {
        return this.config.temperatureOffset;
    }

    get validation(): ValidationMode {
        return this.config.validation;
    }

    /**
     * @param altitude Geopotential pressure altitude in meters
     * @returns Temperature in Kelvin
     */
    public getTemperature(altitude: number): number {
        const offset = this.config.temperatureOffset;
        return this.evaluate(
            () => strict.temperature(altitude, offset),
            () => atmosphere.temperature(altitude, offset)
        );
    }

    /**
     * @param altitude Geopotential pressure altitude in meters
     * @returns Pressure in Pascals
     */
    public getPressure(altitude: number): number {
        const offset = this.config.temperatureOffset;
        return this.evaluate(
            () => strict.pressure(altitude, offset),
            () => atmosphere.pressure(altitude, offset)
        );
    }

    /**
     * @param altitude Geopotential pressure altitude in meters
     * @returns Density in kg/m³
     */
    public getDensity(altitude: number): number {
        return this.getConditions(altitude).density;
    }

    /**
     * @param altitude Geopotential pressure altitude in meters
     * @returns Speed of sound in m/s
     */
    public getSpeedOfSound(altitude: number): number {
        return this.getConditions(altitude).speedOfSound;
    }

    public getConditions(altitude: number): AtmosConditions {
        const offset = this.config.temperatureOffset;
        return this.evaluate(
            () => strict.conditions(altitude, offset),
            () => atmosphere.conditions(altitude, offset)
        );
    }

    /**
     * @param pressure Static pressure in Pascals
     * @returns Geopotential pressure altitude in meters
     */
    public getPressureAltitude(pressure: number): number {
        return this.evaluate(
            () => strict.pressureAltitude(pressure),
            () => atmosphere.pressureAltitude(pressure)
        );
    }

    public casToTas(vcas: number, altitude: number): number {
        const conditions = this.snapshot(altitude);
        return this.evaluate(
            () => strict.vcasToVtas(vcas, conditions),
            () => airspeed.vcasToVtas(vcas, conditions)
        );
    }

    public tasToCas(vtas: number, altitude: number): number {
        const conditions = this.snapshot(altitude);
        return this.evaluate(
            () => strict.vtasToVcas(vtas, conditions),
            () => airspeed.vtasToVcas(vtas, conditions)
        );
    }

    public machToTas(mach: number, altitude: number): number {
        const conditions = this.snapshot(altitude);
        return this.evaluate(
            () => strict.machToVtas(mach, conditions),
            () => airspeed.machToVtas(mach, conditions)
        );
    }

    public tasToMach(vtas: number, altitude: number): number {
        const conditions = this.snapshot(altitude);
        return this.evaluate(
            () => strict.vtasToMach(vtas, conditions),
            () => airspeed.vtasToMach(vtas, conditions)
        );
    }

    public machToCas(mach: number, altitude: number): number {
        const conditions = this.snapshot(altitude);
        return this.evaluate(
            () => strict.machToVcas(mach, conditions),
            () => airspeed.machToVcas(mach, conditions)
        );
    }

    public casToMach(vcas: number, altitude: number): number {
        const conditions = this.snapshot(altitude);
        return this.evaluate(
            () => strict.vcasToMach(vcas, conditions),
            () => airspeed.vcasToMach(vcas, conditions)
        );
    }

    /**
     * Crossover altitude between a CAS and a Mach number, in meters
     */
    public getTransitionAltitude(vcas: number, mach: number): number {
        const offset = this.config.temperatureOffset;
        return this.evaluate(
            () => strict.transitionAltitude(vcas, mach, offset),
            () => airspeed.transitionAltitude(vcas, mach, offset)
        );
    }

    // unchecked, so the conversion's own check is the only one that logs
    private snapshot(altitude: number): AtmosConditions {
        return atmosphere.conditions(altitude, this.config.temperatureOffset);
    }

    private evaluate<T>(checked: () => T, permissive: () => T): T {
        switch (this.config.validation) {
            case 'strict':
                return checked();
            case 'warn':
                try {
                    return checked();
                } catch (error) {
                    if (!(error instanceof AtmosphereDomainError)) {
                        throw error;
                    }
                    console.warn(`StandardAtmosphere: ${error.message}`);
                    return permissive();
                }
            case 'permissive':
            default:
                return permissive();
        }
    }
}

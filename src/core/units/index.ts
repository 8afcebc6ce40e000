// Aviation units to the SI units used by the atmosphere model

export const KNOTS_TO_MS = 1852 / 3600;
export const MS_TO_KNOTS = 3600 / 1852;
export const FEET_TO_METERS = 0.3048;
export const METERS_TO_FEET = 1 / FEET_TO_METERS;
export const CELSIUS_TO_KELVIN = 273.15;

export function knotsToMetersPerSecond(knots: number): number {
    return knots * KNOTS_TO_MS;
}

export function metersPerSecondToKnots(metersPerSecond: number): number {
    return metersPerSecond * MS_TO_KNOTS;
}

export function feetToMeters(feet: number): number {
    return feet * FEET_TO_METERS;
}

export function metersToFeet(meters: number): number {
    return meters * METERS_TO_FEET;
}

/**
 * Flight level to pressure altitude in meters (FL350 = 35000 ft)
 */
export function flightLevelToMeters(flightLevel: number): number {
    return feetToMeters(flightLevel * 100);
}

/**
 * Pressure altitude in meters to the nearest flight level
 */
export function metersToFlightLevel(meters: number): number {
    return Math.round(metersToFeet(meters) / 100);
}

export function celsiusToKelvin(celsius: number): number {
    return celsius + CELSIUS_TO_KELVIN;
}

export function kelvinToCelsius(kelvin: number): number {
    return kelvin - CELSIUS_TO_KELVIN;
}

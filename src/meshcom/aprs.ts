import { MissingFieldError } from "./meshcom.js";

const FEET_PER_METER = 3.2808399;
const DEFAULT_SYMBOL_TABLE = "/";
const DEFAULT_SYMBOL_CODE = ">";

/** Geographic fix, degrees and meters. */
export type GeoFix = {
    latitude: number;
    longitude: number;
    altitude?: number;
};

/** Fix as handed over by a position source, fields may be missing (no fix yet). */
export type MaybeGeoFix = {
    latitude?: number | null;
    longitude?: number | null;
    altitude?: number | null;
};

/**
 * Latitude and longitude must be present and finite (NaN is how most receivers report "no fix").
 * Non-finite altitude is dropped.
 * @throws MissingFieldError
 */
export function validateGeoFix(fix: MaybeGeoFix): GeoFix {
    if (fix.latitude == null || !Number.isFinite(fix.latitude)) {
        throw new MissingFieldError("latitude");
    }

    if (fix.longitude == null || !Number.isFinite(fix.longitude)) {
        throw new MissingFieldError("longitude");
    }

    const validated: GeoFix = { latitude: fix.latitude, longitude: fix.longitude };

    if (fix.altitude != null && Number.isFinite(fix.altitude)) {
        validated.altitude = fix.altitude;
    }

    return validated;
}

/**
 * Decimal degrees to APRS `ddmm.mm` as a number (degrees * 100 + minutes).
 * Sign is dropped, hemisphere is rendered separately.
 */
export function convertToAPRSDegrees(decimalDegrees: number): number {
    const absolute = Math.abs(decimalDegrees);
    const degrees = Math.floor(absolute);
    const minutes = (absolute - degrees) * 60;

    return degrees * 100 + minutes;
}

/**
 * Two decimals, rounding an exact tie to even like printf `%.2f` (`toFixed` rounds it up).
 * A non-negative double is an exact tie at the third decimal only when its fraction is an odd multiple of 1/8.
 */
export function formatTwoDecimals(value: number): string {
    if (Number.isInteger(value * 8) && !Number.isInteger(value * 100)) {
        // value * 100 is exactly n + 0.5 here
        const lower = Math.floor(value * 100);

        return ((lower % 2 === 0 ? lower : lower + 1) / 100).toFixed(2);
    }

    return value.toFixed(2);
}

/** `ddmm.mmN` / `ddmm.mmS` */
export function formatAPRSLatitude(latitude: number): string {
    return `${formatTwoDecimals(convertToAPRSDegrees(latitude)).padStart(7, "0")}${latitude >= 0 ? "N" : "S"}`;
}

/** `dddmm.mmE` / `dddmm.mmW` */
export function formatAPRSLongitude(longitude: number): string {
    return `${formatTwoDecimals(convertToAPRSDegrees(longitude)).padStart(8, "0")}${longitude >= 0 ? "E" : "W"}`;
}

/** Negative altitudes are clamped to 0. */
export function convertMetersToFeet(meters: number): number {
    return Math.max(0, Math.round(meters * FEET_PER_METER));
}

export function formatAPRSAltitude(meters: number): string {
    return convertMetersToFeet(meters).toString(10).padStart(6, "0");
}

/**
 * Render the APRS position payload: `<lat><table><lon><code>[/A=<feet>]`.
 * @param symbol Two characters, table then code. Missing characters fall back to `/` and `>`.
 */
export function encodeAPRSPosition(fix: GeoFix, symbol: string): string {
    const table = symbol.length > 0 ? symbol[0] : DEFAULT_SYMBOL_TABLE;
    const code = symbol.length > 1 ? symbol[1] : DEFAULT_SYMBOL_CODE;
    let payload = `${formatAPRSLatitude(fix.latitude)}${table}${formatAPRSLongitude(fix.longitude)}${code}`;

    if (fix.altitude !== undefined) {
        payload += `/A=${formatAPRSAltitude(fix.altitude)}`;
    }

    return payload;
}

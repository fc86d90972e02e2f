import { readFileSync } from "node:fs";
import type { MaybeGeoFix } from "../meshcom/aprs.js";
import type { BeaconMode, TrackerOptions } from "../tracker/tracker.js";
import type { PortOptions } from "./serial-adapter.js";

export type TrackerConf = {
    adapter: PortOptions;
    /** KISS TNC port */
    kissPort: number;
    radioProfile: string;
    /** dBm, overrides the radio profile's value */
    txPower: number | undefined;
    tracker: TrackerOptions;
    /** Static position, used for position beacons */
    fix: MaybeGeoFix;
};

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(key: string, expected: string): Error {
    return new Error(`Invalid configuration: "${key}" must be ${expected}`);
}

function readString(obj: JsonObject, key: string, fallback?: string): string {
    const value = obj[key] ?? fallback;

    if (typeof value !== "string" || value.length === 0) {
        throw invalid(key, "a non-empty string");
    }

    return value;
}

function readNumber(obj: JsonObject, key: string, fallback?: number): number {
    const value = obj[key] ?? fallback;

    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw invalid(key, "a number");
    }

    return value;
}

function readOptionalNumber(obj: JsonObject, key: string): number | undefined {
    return obj[key] === undefined ? undefined : readNumber(obj, key);
}

function readBoolean(obj: JsonObject, key: string, fallback: boolean): boolean {
    const value = obj[key] ?? fallback;

    if (typeof value !== "boolean") {
        throw invalid(key, "a boolean");
    }

    return value;
}

function readMode(obj: JsonObject): BeaconMode {
    const mode = obj.mode ?? "position";

    if (mode !== "text" && mode !== "position") {
        throw invalid("mode", `"text" or "position"`);
    }

    return mode;
}

function readNodeId(obj: JsonObject): string | number {
    const nodeId = obj.nodeId;

    if (typeof nodeId === "number" || (typeof nodeId === "string" && nodeId.length > 0)) {
        return nodeId;
    }

    throw invalid("nodeId", "a number or a decimal/0x-hex string");
}

function readFix(obj: JsonObject): MaybeGeoFix {
    const fix = obj.fix ?? {};

    if (!isObject(fix)) {
        throw invalid("fix", "an object");
    }

    return {
        latitude: readOptionalNumber(fix, "latitude"),
        longitude: readOptionalNumber(fix, "longitude"),
        altitude: readOptionalNumber(fix, "altitude"),
    };
}

/**
 * Validate a parsed `conf.json`, filling in defaults.
 * @throws Error naming the first invalid key
 */
export function parseTrackerConf(json: unknown): TrackerConf {
    if (!isObject(json)) {
        throw new Error("Invalid configuration: expected an object");
    }

    const adapter = json.adapter;

    if (!isObject(adapter)) {
        throw invalid("adapter", "an object");
    }

    const interval = readNumber(json, "interval", 15);

    if (interval <= 0) {
        throw invalid("interval", "greater than 0");
    }

    return {
        adapter: {
            path: readString(adapter, "path"),
            baudRate: readNumber(adapter, "baudRate", 9600),
            rtscts: readBoolean(adapter, "rtscts", false),
        },
        kissPort: readNumber(json, "kissPort", 0),
        radioProfile: readString(json, "radioProfile", "mesh"),
        txPower: readOptionalNumber(json, "txPower"),
        tracker: {
            callsign: readString(json, "callsign"),
            nodeId: readNodeId(json),
            interval,
            mode: readMode(json),
            destination: readString(json, "destination", "*"),
            text: readString(json, "text", "MeshCom TEST"),
            textMaxHop: readOptionalNumber(json, "textMaxHop"),
            hardwareId: readOptionalNumber(json, "hardwareId"),
            modulationId: readOptionalNumber(json, "modulationId"),
            position: {
                symbol: readString(json, "symbol", "/>"),
                maxHop: readOptionalNumber(json, "positionMaxHop"),
            },
        },
        fix: readFix(json),
    };
}

function argToBool(arg: string): boolean {
    arg = arg.toLowerCase();

    return arg === "1" || arg === "true" || arg === "yes" || arg === "on";
}

/**
 * ADAPTER_PATH, ADAPTER_BAUDRATE, ADAPTER_RTSCTS override `adapter` from file.
 */
export function applyEnvOverrides(conf: TrackerConf, env: NodeJS.ProcessEnv): TrackerConf {
    const adapter = { ...conf.adapter };

    if (env.ADAPTER_PATH) {
        adapter.path = env.ADAPTER_PATH;
    }

    if (env.ADAPTER_BAUDRATE) {
        const baudRate = Number.parseInt(env.ADAPTER_BAUDRATE, 10);

        if (Number.isNaN(baudRate)) {
            throw invalid("ADAPTER_BAUDRATE", "an integer");
        }

        adapter.baudRate = baudRate;
    }

    if (env.ADAPTER_RTSCTS) {
        adapter.rtscts = argToBool(env.ADAPTER_RTSCTS);
    }

    return { ...conf, adapter };
}

export function loadTrackerConf(path: string, env: NodeJS.ProcessEnv = process.env): TrackerConf {
    return applyEnvOverrides(parseTrackerConf(JSON.parse(readFileSync(path, "utf8"))), env);
}

import { logger } from "../utils/logger.js";

const NS = "radio";

/** LoRa modulation settings, `frequency` in Hz, `bandwidth` in Hz, `codingRate` as the denominator of 4/x. */
export type RadioProfile = {
    frequency: number;
    bandwidth?: number;
    spreadingFactor?: number;
    codingRate?: number;
    preambleLength?: number;
    syncWord?: number;
    /** dBm */
    txPower?: number;
    /** Radio-level payload CRC. MeshCom frames carry their own FCS */
    crc?: boolean;
};

export type RadioSetting = keyof RadioProfile;

/** Settings a driver can actually apply, declared once by the driver. */
export type RadioCapabilities = Record<RadioSetting, boolean>;

export interface RadioDriver {
    readonly capabilities: RadioCapabilities;
    /** Only called with settings flagged in `capabilities`. */
    configure(settings: Partial<RadioProfile>): Promise<void>;
    /** Transmit the payload as-is. */
    send(payload: Buffer): Promise<void>;
}

export const RADIO_PROFILES = {
    /** APRS on 433.775 MHz, Semtech default sync word */
    aprs: {
        frequency: 433_775_000,
        bandwidth: 125_000,
        spreadingFactor: 12,
        codingRate: 5,
        preambleLength: 8,
        syncWord: 0x12,
        txPower: 23,
        crc: false,
    },
    /** MeshCom on 433.175 MHz (LORA_BANDWIDTH 250 kHz, LORA_SF 11, LORA_CR 4/6, LORA_PREAMBLE_LENGTH 32, SYNC_WORD_SX127x 0x2b) */
    mesh: {
        frequency: 433_175_000,
        bandwidth: 250_000,
        spreadingFactor: 11,
        codingRate: 6,
        preambleLength: 32,
        syncWord: 0x2b,
        txPower: 23,
        crc: false,
    },
} satisfies Record<string, RadioProfile>;

export type RadioProfileName = keyof typeof RADIO_PROFILES;

const SETTINGS: readonly RadioSetting[] = ["frequency", "bandwidth", "spreadingFactor", "codingRate", "preambleLength", "syncWord", "txPower", "crc"];

function copySetting<K extends RadioSetting>(from: Partial<RadioProfile>, to: Partial<RadioProfile>, setting: K): void {
    to[setting] = from[setting];
}

/**
 * Keeps the LoRa configuration values for each mode together, on top of a driver.
 */
export class Radio {
    readonly driver: RadioDriver;
    readonly #profiles: Readonly<Record<string, RadioProfile>>;
    #activeProfile: string | undefined;

    constructor(driver: RadioDriver, profiles: Readonly<Record<string, RadioProfile>> = RADIO_PROFILES) {
        this.driver = driver;
        this.#profiles = profiles;
        this.#activeProfile = undefined;
    }

    get activeProfile(): string | undefined {
        return this.#activeProfile;
    }

    /**
     * Apply a named profile. Settings the driver cannot change are skipped.
     * @param overrides Take precedence over the profile's values (e.g. `txPower` from configuration)
     * @throws Error if the profile is unknown
     */
    public async setProfile(name: string, overrides: Partial<RadioProfile> = {}): Promise<void> {
        const namedProfile = Object.hasOwn(this.#profiles, name) ? this.#profiles[name] : undefined;

        if (namedProfile === undefined) {
            throw new Error(`Unknown radio profile: ${name}`);
        }

        const profile: Partial<RadioProfile> = { ...namedProfile };

        for (const setting of SETTINGS) {
            if (overrides[setting] !== undefined) {
                copySetting(overrides, profile, setting);
            }
        }

        const settings: Partial<RadioProfile> = {};
        let applicable = 0;

        for (const setting of SETTINGS) {
            const value = profile[setting];

            if (value === undefined) {
                continue;
            }

            if (this.driver.capabilities[setting]) {
                copySetting(profile, settings, setting);
                applicable += 1;
            } else {
                logger.debug(() => `Driver cannot set ${setting}, skipping (profile=${name} value=${value})`, NS);
            }
        }

        if (applicable > 0) {
            await this.driver.configure(settings);
        }

        this.#activeProfile = name;

        logger.info(`Radio profile "${name}" active (${applicable} setting(s) applied)`, NS);
    }

    public async tx(payload: Buffer): Promise<void> {
        await this.driver.send(payload);
    }
}

import { MissingFieldError } from "../meshcom/meshcom.js";
import type { MaybeGeoFix } from "../meshcom/aprs.js";
import { type MeshComPositionOptions, MeshComPositionEncoder } from "../meshcom/meshcom-position.js";
import {
    decodeMeshComTextFrame,
    encodeMeshComTextFrame,
    type MeshComRouting,
    type MeshComTextFrame,
    splitMeshComRoutingPayload,
} from "../meshcom/meshcom-text.js";
import type { Radio } from "../radio/radio.js";
import { logger } from "../utils/logger.js";

const NS = "tracker";

/** Hex characters of a frame shown in TX logs */
const HEX_PREVIEW_LENGTH = 80;

export type BeaconMode = "text" | "position";

export type TrackerOptions = {
    /** Source call sign, uppercased */
    callsign: string;
    /** Gateway/node ID, decimal or 0x-hex */
    nodeId: string | number;
    /** Seconds between beacons */
    interval: number;
    mode: BeaconMode;
    /** Text beacon destination call sign */
    destination: string;
    /** Text beacon message */
    text: string;
    textMaxHop?: number;
    /** Applies to both frame kinds when set */
    hardwareId?: number;
    /** Applies to both frame kinds when set */
    modulationId?: number;
    position?: Omit<MeshComPositionOptions, "callsign" | "hardwareId" | "modulationId">;
};

export interface TrackerCallbacks {
    /** Current position, from GPS or configuration */
    getPosition: () => MaybeGeoFix;
    /** Valid inbound text message */
    onTextMessage: (frame: MeshComTextFrame, routing: MeshComRouting | undefined) => void;
}

/**
 * Periodic MeshCom beacon over a radio, and receiver of inbound text messages.
 */
export class MeshComTracker {
    readonly radio: Radio;
    readonly positionEncoder: MeshComPositionEncoder;
    readonly #options: TrackerOptions;
    readonly #callbacks: TrackerCallbacks;
    readonly #callsign: string;

    /** Text message ID, starts at 1, wraps at 32 bits */
    #textMessageId: number;
    #beaconTimeout: NodeJS.Timeout | undefined;
    /** Bumped by `stop()`, a beacon still sending from a previous run does not re-arm the timer */
    #beaconRun: number;
    #beaconing: boolean;

    constructor(radio: Radio, options: TrackerOptions, callbacks: TrackerCallbacks) {
        this.radio = radio;
        this.positionEncoder = new MeshComPositionEncoder(options.nodeId);
        this.#options = options;
        this.#callbacks = callbacks;
        this.#callsign = options.callsign.toUpperCase();
        this.#textMessageId = 1;
        this.#beaconRun = 0;
        this.#beaconing = false;
    }

    get running(): boolean {
        return this.#beaconing;
    }

    /**
     * Start beaconing, first beacon is sent immediately.
     * The next one is scheduled `interval` seconds after the previous one completed, sends never overlap.
     */
    public async start(): Promise<void> {
        this.stop();

        this.#beaconing = true;

        logger.info(`Starting ${this.#options.mode} beacon every ${this.#options.interval}s as ${this.#callsign}`, NS);

        await this.#runBeacon(this.#beaconRun);
    }

    public stop(): void {
        clearTimeout(this.#beaconTimeout);
        this.#beaconTimeout = undefined;
        this.#beaconing = false;
        this.#beaconRun += 1;
    }

    /**
     * Send the configured beacon.
     * Failures are logged, a bad transmission does not stop the beacon.
     */
    public async sendPeriodicBeacon(): Promise<void> {
        try {
            if (this.#options.mode === "text") {
                await this.sendText(this.#options.destination, this.#options.text);
            } else {
                await this.sendPosition(this.#callbacks.getPosition());
            }
        } catch (error) {
            if (error instanceof MissingFieldError) {
                logger.warning(`No position fix (${error.field}), skipping beacon`, NS);
            } else {
                logger.error(`Beacon failed: ${error}`, NS);
            }
        }
    }

    async #runBeacon(run: number): Promise<void> {
        await this.sendPeriodicBeacon();

        if (run !== this.#beaconRun) {
            logger.debug(() => "Beacon stopped while sending, not re-arming", NS);
            return;
        }

        if (this.#beaconTimeout === undefined) {
            this.#beaconTimeout = setTimeout(this.#runBeacon.bind(this, run), this.#options.interval * 1000);
        } else {
            this.#beaconTimeout.refresh();
        }
    }

    /**
     * @throws EncodingError if text or call signs are not ASCII
     */
    public async sendText(destination: string, text: string): Promise<Buffer> {
        const messageId = this.#textMessageId;
        const frame = encodeMeshComTextFrame({
            source: this.#callsign,
            destination,
            text,
            messageId,
            maxHop: this.#options.textMaxHop,
            hardwareId: this.#options.hardwareId,
            modulationId: this.#options.modulationId,
        });

        this.#textMessageId = (this.#textMessageId + 1) >>> 0;

        await this.#transmit(`TX #${messageId}`, frame);

        return frame;
    }

    /**
     * @throws MissingFieldError if the fix has no latitude or longitude
     */
    public async sendPosition(fix: MaybeGeoFix): Promise<Buffer> {
        const frame = this.positionEncoder.build(fix, {
            ...this.#options.position,
            callsign: this.#callsign,
            hardwareId: this.#options.hardwareId,
            modulationId: this.#options.modulationId,
        });

        await this.#transmit("TX POS", frame);

        return frame;
    }

    /**
     * Handle one received radio packet.
     */
    public onFrame(payload: Buffer): void {
        const result = decodeMeshComTextFrame(payload);

        if (!result.ok) {
            logger.debug(() => `<-- Dropping frame (${result.reason}) len=${payload.byteLength}`, NS);
            return;
        }

        if (!result.frame.checksumValid) {
            logger.debug(() => `<-- Dropping frame msgId=${result.frame.messageId}: checksum mismatch`, NS);
            return;
        }

        const routing = splitMeshComRoutingPayload(result.frame.routingPayload);

        logger.info(`RX #${result.frame.messageId}: ${result.frame.routingPayload}`, NS);

        this.#callbacks.onTextMessage(result.frame, routing);
    }

    async #transmit(label: string, frame: Buffer): Promise<void> {
        const hex = frame.toString("hex");

        logger.info(`${label}: len=${frame.byteLength} bytes hex=${hex.length > HEX_PREVIEW_LENGTH ? `${hex.slice(0, HEX_PREVIEW_LENGTH)}…` : hex}`, NS);

        await this.radio.tx(frame);

        logger.debug(() => `${label}: sent`, NS);
    }
}

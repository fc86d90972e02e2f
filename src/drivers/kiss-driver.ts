import type { RadioCapabilities, RadioDriver, RadioProfile } from "../radio/radio.js";
import { logger } from "../utils/logger.js";
import { decodeKissFrame, encodeKissFrame, KissCommand, type KissFrame } from "./kiss.js";
import { KissParser } from "./kiss-parser.js";
import { KissWriter } from "./kiss-writer.js";

const NS = "kiss-driver";

export interface KissDriverCallbacks {
    /** Payload of a received KISS data frame, one radio packet */
    onFrame: (payload: Buffer) => void;
}

/**
 * Radio driver for a TNC speaking KISS (serial or TCP).
 * Modulation is owned by the TNC configuration, nothing can be set from the host.
 */
export class KissDriver implements RadioDriver {
    readonly capabilities: RadioCapabilities = {
        frequency: false,
        bandwidth: false,
        spreadingFactor: false,
        codingRate: false,
        preambleLength: false,
        syncWord: false,
        txPower: false,
        crc: false,
    };
    readonly writer: KissWriter;
    readonly parser: KissParser;
    /** TNC port frames are sent on, and received frames are accepted from */
    readonly port: number;
    readonly #callbacks: KissDriverCallbacks;

    constructor(callbacks: KissDriverCallbacks, port = 0) {
        this.#callbacks = callbacks;
        this.port = port;
        this.writer = new KissWriter();
        this.parser = new KissParser();
    }

    /* v8 ignore next -- @preserve */
    public configure(_settings: Partial<RadioProfile>): Promise<void> {
        // no capabilities, never called through Radio
        return Promise.resolve();
    }

    public send(payload: Buffer): Promise<void> {
        this.writer.writeBuffer(encodeKissFrame(payload, this.port));

        return Promise.resolve();
    }

    /**
     * Handle a FEND-delimited frame coming from the parser.
     */
    public onKissFrame(frame: Buffer): void {
        let decoded: KissFrame;

        try {
            decoded = decodeKissFrame(frame);
        } catch (error) {
            logger.debug(() => `<-- ${error instanceof Error ? error.message : String(error)}`, NS);
            return;
        }

        if (decoded.command !== KissCommand.DATA) {
            logger.debug(() => `<-- Ignoring KISS command ${decoded.command} on port ${decoded.port}`, NS);
            return;
        }

        if (decoded.port !== this.port) {
            logger.debug(() => `<-- Ignoring data frame from port ${decoded.port}`, NS);
            return;
        }

        this.#callbacks.onFrame(decoded.data);
    }
}

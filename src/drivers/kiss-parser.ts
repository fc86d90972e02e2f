import { Transform, type TransformCallback, type TransformOptions } from "node:stream";
import { logger } from "../utils/logger.js";
import { KissReservedByte } from "./kiss.js";

const NS = "kiss-driver:parser";

/**
 * Splits the TNC byte stream into KISS frames (FEND-delimited, delimiters stripped).
 */
export class KissParser extends Transform {
    #buffer: Buffer;
    /** True once a FEND was seen, everything before it is noise */
    #synced: boolean;

    public constructor(opts?: TransformOptions) {
        super(opts);

        this.#buffer = Buffer.alloc(0);
        this.#synced = false;
    }

    override _transform(chunk: Buffer, _encoding: BufferEncoding, cb: TransformCallback): void {
        let data = Buffer.concat([this.#buffer, chunk]);

        if (!this.#synced) {
            const start = data.indexOf(KissReservedByte.FEND);

            if (start === -1) {
                logger.debug(() => `<<< DISCARD[${data.toString("hex")}]`, NS);

                this.#buffer = Buffer.alloc(0);

                cb();
                return;
            }

            // discard data before first FEND
            data = data.subarray(start + 1);
            this.#synced = true;
        }

        let position = data.indexOf(KissReservedByte.FEND);

        while (position !== -1) {
            // ignore repeated successive FENDs
            if (position > 0) {
                const frame = data.subarray(0, position);

                logger.debug(() => `<<< FRAME[${frame.toString("hex")}]`, NS);

                this.push(frame);
            }

            data = data.subarray(position + 1);
            position = data.indexOf(KissReservedByte.FEND);
        }

        this.#buffer = data;

        cb();
    }

    /* v8 ignore next -- @preserve */
    override _flush(cb: TransformCallback): void {
        // an unterminated frame is incomplete, drop it
        this.#buffer = Buffer.alloc(0);

        cb();
    }
}

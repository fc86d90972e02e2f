import { Readable } from "node:stream";
import { logger } from "../utils/logger.js";

const NS = "kiss-driver:writer";

export class KissWriter extends Readable {
    public writeBuffer(buffer: Buffer): void {
        logger.debug(() => `>>> FRAME[${buffer.toString("hex")}]`, NS);

        this.emit("data", buffer); // XXX: synchronous, skips the internal queue
    }

    /* v8 ignore next -- @preserve */
    public override _read(): void {}
}

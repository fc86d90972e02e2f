/** KISS special bytes */
export const enum KissReservedByte {
    /** frame end */
    FEND = 0xc0,
    /** frame escape */
    FESC = 0xdb,
    /** transposed frame end */
    TFEND = 0xdc,
    /** transposed frame escape */
    TFESC = 0xdd,
}

/** Low nibble of the KISS type byte */
export const enum KissCommand {
    DATA = 0x00,
    TX_DELAY = 0x01,
    PERSISTENCE = 0x02,
    SLOT_TIME = 0x03,
    TX_TAIL = 0x04,
    FULL_DUPLEX = 0x05,
    SET_HARDWARE = 0x06,
    RETURN = 0x0f,
}

export type KissFrame = {
    /** TNC port, 0-15 */
    port: number;
    command: number;
    data: Buffer;
};

/**
 * Wrap a payload in a KISS frame: FEND | type | escaped data | FEND
 */
export function encodeKissFrame(data: Buffer, port = 0, command: number = KissCommand.DATA): Buffer {
    // worst case: every byte escaped
    const frame = Buffer.alloc(data.byteLength * 2 + 3);
    let offset = 0;

    frame[offset++] = KissReservedByte.FEND;
    frame[offset++] = ((port & 0x0f) << 4) | (command & 0x0f);

    for (const byte of data) {
        if (byte === KissReservedByte.FEND) {
            frame[offset++] = KissReservedByte.FESC;
            frame[offset++] = KissReservedByte.TFEND;
        } else if (byte === KissReservedByte.FESC) {
            frame[offset++] = KissReservedByte.FESC;
            frame[offset++] = KissReservedByte.TFESC;
        } else {
            frame[offset++] = byte;
        }
    }

    frame[offset++] = KissReservedByte.FEND;

    return frame.subarray(0, offset);
}

/**
 * Decode a KISS frame, with or without its surrounding FEND bytes.
 * @throws Error on an empty frame or an invalid escape sequence
 */
export function decodeKissFrame(frame: Buffer): KissFrame {
    let start = 0;
    let end = frame.byteLength;

    while (start < end && frame[start] === KissReservedByte.FEND) {
        start++;
    }

    while (end > start && frame[end - 1] === KissReservedByte.FEND) {
        end--;
    }

    if (start === end) {
        throw new Error("Invalid KISS frame: empty");
    }

    const type = frame[start];
    const data = Buffer.alloc(end - start - 1);
    let length = 0;

    for (let i = start + 1; i < end; i++) {
        const byte = frame[i];

        if (byte === KissReservedByte.FESC) {
            i++;

            if (frame[i] === KissReservedByte.TFEND) {
                data[length++] = KissReservedByte.FEND;
            } else if (frame[i] === KissReservedByte.TFESC) {
                data[length++] = KissReservedByte.FESC;
            } else {
                throw new Error(`Invalid KISS frame: bad escape sequence at offset ${i}`);
            }
        } else {
            data[length++] = byte;
        }
    }

    return { port: type >> 4, command: type & 0x0f, data: data.subarray(0, length) };
}

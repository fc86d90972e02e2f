/**
 * const enum with sole purpose of avoiding "magic numbers" in code for well-known values
 */
export const enum MeshComConsts {
    //---- Text message frame
    /** ':' */
    TEXT_START_MARKER = 0x3a,
    /** '#' */
    TEXT_END_MARKER = 0x23,
    /** marker(1) + msgId(4) + hop(1) */
    TEXT_HEADER_SIZE = 6,
    /** terminator(1) + hwId(1) + modId(1) + fcs(2) + end marker(1) */
    TEXT_TRAILER_SIZE = 6,
    TEXT_FRAME_MIN_SIZE = 15,
    TEXT_MAX_HOP_DEFAULT = 5,
    TEXT_HW_ID_DEFAULT = 3,
    TEXT_MOD_ID_DEFAULT = 3,

    //---- Position frame
    /** '!' */
    POSITION_PAYLOAD_TYPE = 0x21,
    POSITION_END_MARKER = 0x7e,
    POSITION_MAX_HOP_DEFAULT = 2,
    POSITION_HW_ID_DEFAULT = 4,
    /** SF11 / CR 4/6 / BW 250k */
    POSITION_MOD_ID_DEFAULT = 3,
    /** 'mesh' routing flag in hop control byte */
    HOP_MESH_FLAG = 0x10,
    /** '#', written instead of a zero firmware subversion */
    FW_SUBVERSION_SENTINEL = 0x23,

    //---- Shared
    PAYLOAD_TERMINATOR = 0x00,
    HOP_MASK = 0x07,
    GATEWAY_ID_MASK = 0x3fffff,
    SEQUENCE_MASK = 0x3ff,
    SEQUENCE_BITS = 10,
}

export const MESHCOM_NOCALL = "NOCALL";

export class MeshComError extends Error {
    constructor(message: string) {
        super(message);

        this.name = new.target.name;
    }
}

/** A required field is absent when building a frame. */
export class MissingFieldError extends MeshComError {
    constructor(public readonly field: string) {
        super(`Missing required field: ${field}`);
    }
}

/** Content that must be ASCII (without NUL, the payload terminator) is not. */
export class EncodingError extends MeshComError {
    constructor(
        public readonly field: string,
        public readonly position: number,
        public readonly character: "non-ascii" | "nul" = "non-ascii",
    ) {
        super(`${character === "nul" ? "NUL" : "Non-ASCII"} character in ${field} at position ${position}`);
    }
}

/**
 * Frame check sequence used by both frame kinds: plain byte sum, truncated to 16 bits.
 */
export function meshComChecksum(data: Uint8Array): number {
    let sum = 0;

    for (let i = 0; i < data.byteLength; i++) {
        sum = (sum + data[i]) & 0xffff;
    }

    return sum;
}

/**
 * Encode a string as ASCII bytes. NUL is rejected, decoders stop at the first one.
 * @param field Name reported in the EncodingError
 * @throws EncodingError on NUL or any code unit above 0x7f
 */
export function encodeASCII(value: string, field: string): Buffer {
    const data = Buffer.alloc(value.length);

    for (let i = 0; i < value.length; i++) {
        const code = value.charCodeAt(i);

        if (code > 0x7f) {
            throw new EncodingError(field, i);
        }

        if (code === MeshComConsts.PAYLOAD_TERMINATOR) {
            throw new EncodingError(field, i, "nul");
        }

        data[i] = code;
    }

    return data;
}

/**
 * Best-effort ASCII decode. Bytes above 0x7f become U+FFFD.
 */
export function decodeASCII(data: Uint8Array): string {
    let value = "";

    for (let i = 0; i < data.byteLength; i++) {
        value += data[i] > 0x7f ? "\ufffd" : String.fromCharCode(data[i]);
    }

    return value;
}

import { decodeASCII, encodeASCII, MeshComConsts, meshComChecksum } from "./meshcom.js";

/** Fields to build a text message frame from. */
export type MeshComTextMessage = {
    source: string;
    destination: string;
    text: string;
    /** uint32, masked */
    messageId: number;
    /** 0-7, masked. Default: 5 */
    maxHop?: number;
    /** Default: 3 */
    hardwareId?: number;
    /** Default: 3 */
    modulationId?: number;
};

/** Decoded text message frame. */
export type MeshComTextFrame = {
    messageId: number;
    maxHop: number;
    /** `<SOURCE>><DEST>:<TEXT>` */
    routingPayload: string;
    hardwareId: number;
    modulationId: number;
    /** FCS as received */
    checksum: number;
    /** FCS matches the byte sum of everything before it */
    checksumValid: boolean;
};

export type MeshComTextParseFailureReason = "too-short" | "bad-start-marker" | "bad-end-marker" | "missing-terminator";

export type MeshComTextParseFailure = { ok: false; reason: MeshComTextParseFailureReason };

export type MeshComTextParseResult = { ok: true; frame: MeshComTextFrame } | MeshComTextParseFailure;

export type MeshComRouting = {
    source: string;
    destination: string;
    text: string;
};

/**
 * Build a MeshCom text message frame:
 *
 * ':' | msgId (uint32 LE) | hop | "<SRC>><DEST>:<TEXT>" | 0x00 | hwId | modId | FCS (uint16 LE) | '#'
 *
 * @throws EncodingError if source, destination or text is not ASCII
 */
export function encodeMeshComTextFrame(message: MeshComTextMessage): Buffer {
    const source = encodeASCII(message.source, "source");
    const destination = encodeASCII(message.destination, "destination");
    const text = encodeASCII(message.text, "text");
    const routingPayload = Buffer.concat([source, Buffer.from(">"), destination, Buffer.from(":"), text]);
    const data = Buffer.alloc(MeshComConsts.TEXT_HEADER_SIZE + routingPayload.byteLength + MeshComConsts.TEXT_TRAILER_SIZE);
    let offset = 0;

    offset = data.writeUInt8(MeshComConsts.TEXT_START_MARKER, offset);
    offset = data.writeUInt32LE(message.messageId >>> 0, offset);
    // out-of-range hop counts are truncated, not rejected (flags bits stay 0)
    offset = data.writeUInt8((message.maxHop ?? MeshComConsts.TEXT_MAX_HOP_DEFAULT) & MeshComConsts.HOP_MASK, offset);
    offset += routingPayload.copy(data, offset);
    offset = data.writeUInt8(MeshComConsts.PAYLOAD_TERMINATOR, offset);
    offset = data.writeUInt8((message.hardwareId ?? MeshComConsts.TEXT_HW_ID_DEFAULT) & 0xff, offset);
    offset = data.writeUInt8((message.modulationId ?? MeshComConsts.TEXT_MOD_ID_DEFAULT) & 0xff, offset);
    offset = data.writeUInt16LE(meshComChecksum(data.subarray(0, offset)), offset);
    data.writeUInt8(MeshComConsts.TEXT_END_MARKER, offset);

    return data;
}

/**
 * Decode a received text message frame. Never throws.
 *
 * The FCS is checked and reported via `checksumValid`, it does not fail the parse.
 */
export function decodeMeshComTextFrame(data: Buffer): MeshComTextParseResult {
    if (data.byteLength < MeshComConsts.TEXT_FRAME_MIN_SIZE) {
        return { ok: false, reason: "too-short" };
    }

    if (data[0] !== MeshComConsts.TEXT_START_MARKER) {
        return { ok: false, reason: "bad-start-marker" };
    }

    if (data[data.byteLength - 1] !== MeshComConsts.TEXT_END_MARKER) {
        return { ok: false, reason: "bad-end-marker" };
    }

    const terminator = data.indexOf(MeshComConsts.PAYLOAD_TERMINATOR, MeshComConsts.TEXT_HEADER_SIZE);

    // trailer after the terminator must fit before the end of the buffer
    if (terminator === -1 || terminator > data.byteLength - MeshComConsts.TEXT_TRAILER_SIZE) {
        return { ok: false, reason: "missing-terminator" };
    }

    const checksum = data.readUInt16LE(terminator + 3);

    return {
        ok: true,
        frame: {
            messageId: data.readUInt32LE(1),
            maxHop: data.readUInt8(5) & MeshComConsts.HOP_MASK,
            routingPayload: decodeASCII(data.subarray(MeshComConsts.TEXT_HEADER_SIZE, terminator)),
            hardwareId: data.readUInt8(terminator + 1),
            modulationId: data.readUInt8(terminator + 2),
            checksum,
            checksumValid: meshComChecksum(data.subarray(0, terminator + 3)) === checksum,
        },
    };
}

/**
 * Split `<SOURCE>><DEST>:<TEXT>` on the first '>' and the first ':' after it.
 * @returns undefined if either separator is missing
 */
export function splitMeshComRoutingPayload(routingPayload: string): MeshComRouting | undefined {
    const pathSeparator = routingPayload.indexOf(">");

    if (pathSeparator === -1) {
        return undefined;
    }

    const textSeparator = routingPayload.indexOf(":", pathSeparator + 1);

    if (textSeparator === -1) {
        return undefined;
    }

    return {
        source: routingPayload.slice(0, pathSeparator),
        destination: routingPayload.slice(pathSeparator + 1, textSeparator),
        text: routingPayload.slice(textSeparator + 1),
    };
}

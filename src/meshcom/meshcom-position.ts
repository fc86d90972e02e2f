import { logger } from "../utils/logger.js";
import { encodeAPRSPosition, type GeoFix, type MaybeGeoFix, validateGeoFix } from "./aprs.js";
import { encodeASCII, MESHCOM_NOCALL, MeshComConsts, meshComChecksum } from "./meshcom.js";
import { composeMessageId, parseNodeId, SequenceCounter } from "./node-id.js";

const NS = "meshcom:position";

/** Destination of position reports: broadcast. */
const POSITION_DESTINATION = "*";

export type MeshComPositionOptions = {
    /** Source call sign, uppercased. Default: "NOCALL" */
    callsign?: string;
    /** APRS symbol, table then code. Default: "/>" */
    symbol?: string;
    /** 0-7, masked. Default: 2 */
    maxHop?: number;
    /** Default: 4 */
    hardwareId?: number;
    /** Default: 3 */
    modulationId?: number;
    /** Default: 0 */
    firmwareVersion?: number;
    /** Default: 0 (sent as '#') */
    firmwareSubversion?: number;
};

/**
 * Build a MeshCom position frame for a given message ID:
 *
 * '!' | msgId (uint32 LE) | hop | "<SRC>>*!" | APRS position | 0x00 | hwId | modId | FCS (uint16 BE) | fwVer | lastHwId | fwSubVer | 0x7E
 *
 * @throws EncodingError if call sign or symbol is not ASCII
 */
export function encodeMeshComPositionFrame(fix: GeoFix, messageId: number, options: MeshComPositionOptions = {}): Buffer {
    const callsign = (options.callsign || MESHCOM_NOCALL).toUpperCase();
    const hardwareId = (options.hardwareId ?? MeshComConsts.POSITION_HW_ID_DEFAULT) & 0xff;
    const firmwareSubversion = options.firmwareSubversion ?? 0;
    const path = encodeASCII(`${callsign}>${POSITION_DESTINATION}${String.fromCharCode(MeshComConsts.POSITION_PAYLOAD_TYPE)}`, "callsign");
    const payload = encodeASCII(encodeAPRSPosition(fix, options.symbol ?? "/>"), "symbol");
    const data = Buffer.alloc(6 + path.byteLength + payload.byteLength + 3 + 2 + 4);
    let offset = 0;

    offset = data.writeUInt8(MeshComConsts.POSITION_PAYLOAD_TYPE, offset);
    offset = data.writeUInt32LE(messageId >>> 0, offset);
    // hop count masked to 3 bits before the mesh flag is set, out-of-range values are truncated, not rejected
    offset = data.writeUInt8(((options.maxHop ?? MeshComConsts.POSITION_MAX_HOP_DEFAULT) & MeshComConsts.HOP_MASK) | MeshComConsts.HOP_MESH_FLAG, offset);
    offset += path.copy(data, offset);
    offset += payload.copy(data, offset);
    offset = data.writeUInt8(MeshComConsts.PAYLOAD_TERMINATOR, offset);
    offset = data.writeUInt8(hardwareId, offset);
    offset = data.writeUInt8((options.modulationId ?? MeshComConsts.POSITION_MOD_ID_DEFAULT) & 0xff, offset);
    // compatibility quirk: big-endian here, little-endian in text frames
    offset = data.writeUInt16BE(meshComChecksum(data.subarray(0, offset)), offset);
    offset = data.writeUInt8((options.firmwareVersion ?? 0) & 0xff, offset);
    // last hop hardware ID, we are the last hop
    offset = data.writeUInt8(hardwareId, offset);
    // compatibility quirk: firmware never sends a zero subversion, 0 goes out as '#' (test is done before masking)
    offset = data.writeUInt8(firmwareSubversion === 0 ? MeshComConsts.FW_SUBVERSION_SENTINEL : firmwareSubversion & 0xff, offset);
    data.writeUInt8(MeshComConsts.POSITION_END_MARKER, offset);

    return data;
}

/**
 * Position frame builder bound to one node.
 * Owns the rolling sequence counter, so message IDs are unique per encoder (modulo 1024 frames).
 */
export class MeshComPositionEncoder {
    /** 22-bit gateway ID, high bits of every message ID */
    readonly gatewayId: number;
    readonly #sequence: SequenceCounter;

    constructor(nodeId: string | number, sequence = new SequenceCounter()) {
        this.gatewayId = parseNodeId(nodeId) & MeshComConsts.GATEWAY_ID_MASK;
        this.#sequence = sequence;
    }

    /**
     * Build the next position frame. The sequence counter only advances when a frame is returned.
     * @throws MissingFieldError if latitude or longitude is absent
     * @throws EncodingError if call sign or symbol is not ASCII
     */
    public build(fix: MaybeGeoFix, options: MeshComPositionOptions = {}): Buffer {
        const validFix = validateGeoFix(fix);
        const sequence = this.#sequence.current;
        const frame = encodeMeshComPositionFrame(validFix, composeMessageId(this.gatewayId, sequence), options);

        this.#sequence.next();
        logger.debug(() => `Built position frame seq=${sequence} gatewayId=${this.gatewayId}`, NS);

        return frame;
    }
}

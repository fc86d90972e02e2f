import { logger } from "../utils/logger.js";
import { MeshComConsts } from "./meshcom.js";

const NS = "meshcom:node-id";

/** single `_` separators between digits, as in `1_000` */
const DECIMAL_REGEX = /^([+-]?)(\d+(?:_\d+)*)$/;
/** `_` also allowed right after the prefix, as in `0x_3F` */
const HEX_REGEX = /^([+-]?)0x_?([0-9a-f]+(?:_[0-9a-f]+)*)$/i;

/**
 * Parse a node ID from configuration, as a number or as decimal / `0x`-prefixed hex text.
 * The result is fitted into 32 bits (two's complement for negative values).
 * Unparseable text yields 0 (logged).
 */
export function parseNodeId(input: string | number): number {
    if (typeof input === "number") {
        return Number.isFinite(input) ? Number(BigInt.asUintN(32, BigInt(Math.trunc(input)))) : 0;
    }

    const text = input.trim();
    let sign: string;
    let magnitude: bigint;
    const hexMatch = HEX_REGEX.exec(text);

    if (hexMatch !== null) {
        sign = hexMatch[1];
        magnitude = BigInt(`0x${hexMatch[2].replaceAll("_", "")}`);
    } else {
        const decimalMatch = DECIMAL_REGEX.exec(text);

        if (decimalMatch === null) {
            logger.warning(`Invalid node ID "${input}", using 0`, NS);

            return 0;
        }

        sign = decimalMatch[1];
        magnitude = BigInt(decimalMatch[2].replaceAll("_", ""));
    }

    return Number(BigInt.asUintN(32, sign === "-" ? -magnitude : magnitude));
}

/**
 * `(gatewayId & 0x3FFFFF) << 10 | (sequence & 0x3FF)`, as unsigned 32-bit.
 */
export function composeMessageId(gatewayId: number, sequence: number): number {
    return (((gatewayId & MeshComConsts.GATEWAY_ID_MASK) << MeshComConsts.SEQUENCE_BITS) | (sequence & MeshComConsts.SEQUENCE_MASK)) >>> 0;
}

/**
 * Rolling 10-bit message sequence, one per position frame.
 * Starts at 0 for the lifetime of the owner, a restart repeats IDs.
 */
export class SequenceCounter {
    #value = 0;

    /** Value the next call to `next()` will return. */
    get current(): number {
        return this.#value;
    }

    public next(): number {
        const value = this.#value & MeshComConsts.SEQUENCE_MASK;
        this.#value = (value + 1) & MeshComConsts.SEQUENCE_MASK;

        return value;
    }
}

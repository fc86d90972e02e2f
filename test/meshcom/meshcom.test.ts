import { describe, expect, it, vi } from "vitest";
import {
    convertMetersToFeet,
    convertToAPRSDegrees,
    encodeAPRSPosition,
    formatAPRSAltitude,
    formatAPRSLatitude,
    formatAPRSLongitude,
    formatTwoDecimals,
    validateGeoFix,
} from "../../src/meshcom/aprs.js";
import { decodeASCII, EncodingError, encodeASCII, meshComChecksum, MissingFieldError } from "../../src/meshcom/meshcom.js";
import { composeMessageId, parseNodeId, SequenceCounter } from "../../src/meshcom/node-id.js";
import { logger } from "../../src/utils/logger.js";

describe("MeshCom", () => {
    describe("checksum", () => {
        it("is 0 for empty input", () => {
            expect(meshComChecksum(Buffer.alloc(0))).toStrictEqual(0);
        });

        it("sums bytes", () => {
            expect(meshComChecksum(Buffer.from([1, 2, 3]))).toStrictEqual(6);
            expect(meshComChecksum(Buffer.alloc(257, 0xff))).toStrictEqual(0xffff);
        });

        it("wraps at 16 bits", () => {
            // 257 * 0xff + 1 = 65536
            expect(meshComChecksum(Buffer.concat([Buffer.alloc(257, 0xff), Buffer.from([0x01])]))).toStrictEqual(0);
            expect(meshComChecksum(Buffer.concat([Buffer.alloc(257, 0xff), Buffer.from([0x05])]))).toStrictEqual(4);
        });
    });

    describe("ASCII", () => {
        it("encodes ASCII", () => {
            expect(encodeASCII("A>B:", "text")).toStrictEqual(Buffer.from([0x41, 0x3e, 0x42, 0x3a]));
        });

        it("throws on non-ASCII with position", () => {
            expect(() => encodeASCII("Grüße", "text")).toThrowError(new EncodingError("text", 2));
            expect(() => encodeASCII("Grüße", "text")).toThrowError("Non-ASCII character in text at position 2");
        });

        it("throws on NUL with position", () => {
            expect(() => encodeASCII("x\u0000y", "text")).toThrowError(new EncodingError("text", 1, "nul"));
            expect(() => encodeASCII("x\u0000y", "text")).toThrowError("NUL character in text at position 1");
        });

        it("decodes with replacement of high bytes", () => {
            expect(decodeASCII(Buffer.from([0x41, 0xff, 0x42]))).toStrictEqual("A\ufffdB");
        });
    });

    describe("APRS coordinates", () => {
        it("converts decimal degrees to ddmm.mm", () => {
            expect(convertToAPRSDegrees(0)).toStrictEqual(0);
            expect(convertToAPRSDegrees(50.5)).toStrictEqual(5030);
            expect(convertToAPRSDegrees(10.25)).toStrictEqual(1015);
        });

        it("ignores sign", () => {
            // 1 degree + 0.25 * 60 minutes
            expect(convertToAPRSDegrees(-1.25)).toStrictEqual(115);
            expect(convertToAPRSDegrees(-50.5)).toStrictEqual(convertToAPRSDegrees(50.5));
        });

        it("formats latitude with width 7 and hemisphere", () => {
            expect(formatAPRSLatitude(50.5)).toStrictEqual("5030.00N");
            expect(formatAPRSLatitude(-1.25)).toStrictEqual("0115.00S");
            expect(formatAPRSLatitude(0)).toStrictEqual("0000.00N");
            expect(formatAPRSLatitude(-33.8675)).toStrictEqual("3352.05S");
        });

        it("rounds exact ties at the third decimal to even", () => {
            expect(formatTwoDecimals(1030.125)).toStrictEqual("1030.12");
            expect(formatTwoDecimals(2.625)).toStrictEqual("2.62");
            expect(formatTwoDecimals(0.375)).toStrictEqual("0.38");
            expect(formatTwoDecimals(0.875)).toStrictEqual("0.88");
            // not exact ties, nearest value wins
            expect(formatTwoDecimals(1.005)).toStrictEqual("1.00");
            expect(formatTwoDecimals(3352.05)).toStrictEqual("3352.05");
            expect(formatTwoDecimals(1.5)).toStrictEqual("1.50");
        });

        it("rounds coordinate ties to even", () => {
            // 1030.125 minutes exactly
            expect(formatAPRSLatitude(10.502083333333333)).toStrictEqual("1030.12N");
            // 1000.125 minutes exactly
            expect(formatAPRSLongitude(-10.002083333333333)).toStrictEqual("01000.12W");
        });

        it("formats longitude with width 8 and hemisphere", () => {
            expect(formatAPRSLongitude(10.25)).toStrictEqual("01015.00E");
            expect(formatAPRSLongitude(-151.207)).toStrictEqual("15112.42W");
            expect(formatAPRSLongitude(-0.5)).toStrictEqual("00030.00W");
        });
    });

    describe("APRS altitude", () => {
        it("converts meters to feet", () => {
            expect(convertMetersToFeet(0)).toStrictEqual(0);
            expect(convertMetersToFeet(100)).toStrictEqual(328);
        });

        it("clamps negative altitude to 0", () => {
            expect(convertMetersToFeet(-5)).toStrictEqual(0);
            expect(formatAPRSAltitude(-5)).toStrictEqual("000000");
        });

        it("rounds to nearest foot", () => {
            // 0.2 m = 0.656 ft
            expect(formatAPRSAltitude(0.2)).toStrictEqual("000001");
        });

        it("formats as 6 digits", () => {
            expect(formatAPRSAltitude(0)).toStrictEqual("000000");
            expect(formatAPRSAltitude(100)).toStrictEqual("000328");
        });
    });

    describe("APRS position", () => {
        it("renders position with altitude", () => {
            expect(encodeAPRSPosition({ latitude: 50.5, longitude: 10.25, altitude: 100 }, "/>")).toStrictEqual("5030.00N/01015.00E>/A=000328");
        });

        it("renders position without altitude", () => {
            expect(encodeAPRSPosition({ latitude: -33.8675, longitude: -151.207 }, "L>")).toStrictEqual("3352.05SL15112.42W>");
        });

        it("falls back to default symbol table and code", () => {
            expect(encodeAPRSPosition({ latitude: 50.5, longitude: 10.25 }, "")).toStrictEqual("5030.00N/01015.00E>");
            expect(encodeAPRSPosition({ latitude: 50.5, longitude: 10.25 }, "\\")).toStrictEqual("5030.00N\\01015.00E>");
        });

        it("validates fix", () => {
            expect(validateGeoFix({ latitude: 1, longitude: 2, altitude: null })).toStrictEqual({ latitude: 1, longitude: 2 });
            expect(validateGeoFix({ latitude: 1, longitude: 2, altitude: -3 })).toStrictEqual({ latitude: 1, longitude: 2, altitude: -3 });
            expect(() => validateGeoFix({ longitude: 2 })).toThrowError(new MissingFieldError("latitude"));
            expect(() => validateGeoFix({ latitude: 1, longitude: null })).toThrowError(new MissingFieldError("longitude"));
            expect(() => validateGeoFix({ latitude: 1, longitude: Number.NaN })).toThrowError("Missing required field: longitude");
        });

        it("does not default missing coordinates to zero", () => {
            expect(() => validateGeoFix({ latitude: 0 })).toThrowError(MissingFieldError);
        });
    });

    describe("node ID", () => {
        it("parses hex and decimal", () => {
            expect(parseNodeId("0x3F")).toStrictEqual(63);
            expect(parseNodeId("0X3f")).toStrictEqual(63);
            expect(parseNodeId("63")).toStrictEqual(63);
            expect(parseNodeId(" 42 ")).toStrictEqual(42);
            expect(parseNodeId(63)).toStrictEqual(63);
        });

        it("fits values into 32 bits", () => {
            expect(parseNodeId("-1")).toStrictEqual(0xffffffff);
            expect(parseNodeId("0x100000001")).toStrictEqual(1);
            expect(parseNodeId(0x100000002)).toStrictEqual(2);
            expect(parseNodeId(3.9)).toStrictEqual(3);
        });

        it("accepts underscore digit separators", () => {
            expect(parseNodeId("1_000")).toStrictEqual(1000);
            expect(parseNodeId("0x_3F")).toStrictEqual(63);
            expect(parseNodeId("0x3_f")).toStrictEqual(63);
        });

        it("rejects misplaced underscores", () => {
            expect(parseNodeId("_1")).toStrictEqual(0);
            expect(parseNodeId("1__0")).toStrictEqual(0);
            expect(parseNodeId("10_")).toStrictEqual(0);
            expect(parseNodeId("0x__3F")).toStrictEqual(0);
        });

        it("falls back to 0 on invalid input and logs it", () => {
            const warningSpy = vi.spyOn(logger, "warning");

            expect(parseNodeId("not-a-number")).toStrictEqual(0);
            expect(warningSpy).toHaveBeenCalledWith('Invalid node ID "not-a-number", using 0', "meshcom:node-id");
            expect(parseNodeId("0xZZ")).toStrictEqual(0);
            expect(parseNodeId("0x")).toStrictEqual(0);
            expect(parseNodeId("")).toStrictEqual(0);
            expect(parseNodeId(Number.NaN)).toStrictEqual(0);
        });

        it("composes message ID from gateway ID and sequence", () => {
            expect(composeMessageId(63, 0)).toStrictEqual(0xfc00);
            expect(composeMessageId(63, 1)).toStrictEqual(0xfc01);
            expect(composeMessageId(0x3fffff, 0x3ff)).toStrictEqual(0xffffffff);
        });

        it("masks out-of-range gateway ID and sequence", () => {
            expect(composeMessageId(0x400001, 0x401)).toStrictEqual(0x401);
        });

        it("rolls sequence over 10 bits", () => {
            const counter = new SequenceCounter();
            const seen = new Set<number>();

            for (let i = 0; i < 1024; i++) {
                const value = counter.next();

                expect(value).toStrictEqual(i);
                seen.add(value);
            }

            expect(seen.size).toStrictEqual(1024);
            expect(counter.current).toStrictEqual(0);
            expect(counter.next()).toStrictEqual(0);
            expect(counter.next()).toStrictEqual(1);
        });
    });
});

import { finished } from "node:stream/promises";
import { describe, expect, it } from "vitest";
import { decodeKissFrame, encodeKissFrame, KissCommand } from "../../src/drivers/kiss.js";
import { KissParser } from "../../src/drivers/kiss-parser.js";

describe("KISS", () => {
    describe("frame", () => {
        it("encodes with escaping", () => {
            expect(encodeKissFrame(Buffer.from([0x01, 0xc0, 0xdb, 0x02])).toString("hex")).toStrictEqual("c00001dbdcdbdd02c0");
        });

        it("encodes port and command in type byte", () => {
            expect(encodeKissFrame(Buffer.from([0x41]), 1).toString("hex")).toStrictEqual("c01041c0");
            expect(encodeKissFrame(Buffer.alloc(0), 0, KissCommand.TX_DELAY).toString("hex")).toStrictEqual("c001c0");
            expect(encodeKissFrame(Buffer.from([0x41]), 0x1f, KissCommand.RETURN).toString("hex")).toStrictEqual("c0ff41c0");
        });

        it("decodes with surrounding FENDs", () => {
            expect(decodeKissFrame(Buffer.from("c00001dbdcdbdd02c0", "hex"))).toStrictEqual({
                port: 0,
                command: KissCommand.DATA,
                data: Buffer.from([0x01, 0xc0, 0xdb, 0x02]),
            });
        });

        it("decodes without FENDs", () => {
            expect(decodeKissFrame(Buffer.from("2141dbdc", "hex"))).toStrictEqual({
                port: 2,
                command: 1,
                data: Buffer.from([0x41, 0xc0]),
            });
        });

        it("throws on empty frame", () => {
            expect(() => decodeKissFrame(Buffer.from([0xc0, 0xc0]))).toThrowError("Invalid KISS frame: empty");
            expect(() => decodeKissFrame(Buffer.alloc(0))).toThrowError("Invalid KISS frame: empty");
        });

        it("throws on bad escape", () => {
            expect(() => decodeKissFrame(Buffer.from([0xc0, 0x00, 0xdb, 0x41, 0xc0]))).toThrowError(
                "Invalid KISS frame: bad escape sequence at offset 3",
            );
            // dangling escape at end of frame
            expect(() => decodeKissFrame(Buffer.from([0x00, 0x41, 0xdb]))).toThrowError("Invalid KISS frame: bad escape sequence at offset 3");
        });
    });

    describe("parser", () => {
        it("splits stream into frames across chunks", async () => {
            const parser = new KissParser();
            const frames: string[] = [];

            parser.on("data", (frame: Buffer) => {
                frames.push(frame.toString("hex"));
            });

            // noise before first FEND
            parser.write(Buffer.from([0x11, 0x22]));
            parser.write(Buffer.from([0x33, 0xc0, 0x00, 0x41]));
            parser.write(Buffer.from([0x42, 0xc0, 0xc0, 0x00, 0x43, 0xc0, 0x00, 0x44]));
            parser.end();

            await finished(parser);

            expect(frames).toStrictEqual(["004142", "0043"]);
        });

        it("outputs escaped content untouched", async () => {
            const parser = new KissParser();
            const frames: string[] = [];

            parser.on("data", (frame: Buffer) => {
                frames.push(frame.toString("hex"));
            });

            parser.write(encodeKissFrame(Buffer.from([0xc0, 0xdb])));
            parser.end();

            await finished(parser);

            expect(frames).toStrictEqual(["00dbdcdbdd"]);
            expect(decodeKissFrame(Buffer.from(frames[0], "hex")).data).toStrictEqual(Buffer.from([0xc0, 0xdb]));
        });
    });
});

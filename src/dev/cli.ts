import { realpathSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { loadTrackerConf } from "./conf.js";
import { SerialAdapter } from "./serial-adapter.js";

type Mode = "text" | "position" | "beacon" | "listen";

function printHelp(shouldThrow: boolean): void {
    console.log("\nText message:");
    console.log("    dev:cli text <destination> <message...>");

    console.log("\nPosition report (uses 'fix' from conf):");
    console.log("    dev:cli position");

    console.log("\nBeacon (mode and interval from conf, receives while running):");
    console.log("    dev:cli beacon");

    console.log("\nListen (log received text messages):");
    console.log("    dev:cli listen");

    console.log("\n- Following ENV vars will override 'conf.json': ADAPTER_PATH, ADAPTER_BAUDRATE, ADAPTER_RTSCTS");
    console.log("- ADAPTER_PATH can be a serial port path, or tcp://<host>:<port> for a KISS TCP TNC");

    if (shouldThrow) {
        throw new Error("Invalid parameters");
    }
}

function isMode(arg: string | undefined): arg is Mode {
    return arg === "text" || arg === "position" || arg === "beacon" || arg === "listen";
}

async function main(): Promise<void> {
    const confPath = join(dirname(fileURLToPath(import.meta.url)), "conf.json");
    const conf = loadTrackerConf(confPath);

    console.log("Starting with conf:", JSON.stringify(conf));

    const mode = process.argv[2];

    if (mode === "help") {
        // after above log to be able to see conf without side-effect
        printHelp(false);
        return;
    }

    if (!isMode(mode)) {
        printHelp(true);
        return;
    }

    const adapter = new SerialAdapter(conf.adapter, conf.kissPort, conf.tracker, {
        getPosition: () => conf.fix,
        onTextMessage: (frame, routing) => {
            console.log(
                routing
                    ? `[${frame.messageId}] ${routing.source} -> ${routing.destination}: ${routing.text}`
                    : `[${frame.messageId}] ${frame.routingPayload}`,
            );
        },
    });

    const onStop = async (): Promise<void> => {
        await adapter.stop();
    };

    process.on("SIGINT", onStop);
    process.on("SIGTERM", onStop);

    await adapter.start(conf.radioProfile, { txPower: conf.txPower });

    switch (mode) {
        case "text": {
            if (process.argv.length < 5) {
                await adapter.stop();
                printHelp(true);
            }

            await adapter.tracker.sendText(process.argv[3], process.argv.slice(4).join(" "));
            await adapter.stop();
            break;
        }
        case "position": {
            await adapter.tracker.sendPosition(conf.fix);
            await adapter.stop();
            break;
        }
        case "beacon": {
            await adapter.tracker.start();
            break;
        }
        case "listen": {
            console.log("Listening, Ctrl+C to stop");
            break;
        }
    }
}

if (process.argv[1] !== undefined && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
    main().catch((error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    });
}

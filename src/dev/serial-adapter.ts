import { Socket } from "node:net";
import { SerialPort } from "serialport";
import { KissDriver } from "../drivers/kiss-driver.js";
import { Radio, type RadioProfile } from "../radio/radio.js";
import { MeshComTracker, type TrackerCallbacks, type TrackerOptions } from "../tracker/tracker.js";
import { logger } from "../utils/logger.js";

const NS = "serial-adapter";

export function isTcpPath(path: string): boolean {
    // tcp path must be: tcp://<host>:<port>
    return /^(?:tcp:\/\/)[\w.-]+[:][\d]+$/.test(path);
}

/**
 * Example:
 * ```ts
 * {
 *     path: '/dev/ttyUSB0',
 *     baudRate: 9600,
 *     rtscts: false,
 * }
 * ```
 * or `{ path: 'tcp://127.0.0.1:8001' }` for a software TNC.
 */
export type PortOptions = {
    path: string;
    //---- serial only
    baudRate?: number;
    rtscts?: boolean;
};

/**
 * KISS TNC on a serial port or TCP socket, with a radio and a tracker on top. Started via `cli.ts`.
 */
export class SerialAdapter {
    public readonly driver: KissDriver;
    public readonly radio: Radio;
    public readonly tracker: MeshComTracker;
    readonly #portOptions: PortOptions;
    #port: SerialPort | Socket | undefined;
    /** True when serial/socket is currently closing */
    #closing: boolean;

    constructor(portOptions: PortOptions, kissPort: number, trackerOptions: TrackerOptions, callbacks: TrackerCallbacks) {
        this.driver = new KissDriver({ onFrame: (payload) => this.tracker.onFrame(payload) }, kissPort);
        this.radio = new Radio(this.driver);
        this.tracker = new MeshComTracker(this.radio, trackerOptions, callbacks);
        this.#portOptions = portOptions;
        this.#closing = false;
    }

    get portOpen(): boolean {
        if (this.#closing || this.#port === undefined) {
            return false;
        }

        return this.#port instanceof Socket ? !this.#port.closed : this.#port.isOpen;
    }

    /**
     * Open the serial or socket port and hook it to the driver's parser/writer.
     */
    public async initPort(): Promise<void> {
        await this.closePort(); // will do nothing if nothing's open

        this.#closing = false;

        const port = isTcpPath(this.#portOptions.path) ? await this.#openSocket(this.#portOptions.path) : await this.#openSerial();

        this.#port = port;

        this.driver.writer.pipe(port);
        port.pipe(this.driver.parser, { end: false });
        this.driver.parser.on("data", this.driver.onKissFrame.bind(this.driver));
        port.once("close", this.onPortClose.bind(this));
        port.on("error", this.onPortError.bind(this));
    }

    #openSocket(path: string): Promise<Socket> {
        const url = new URL(path);
        const socket = new Socket();

        logger.debug(() => `Opening TCP socket with ${url.host}`, NS);

        socket.setNoDelay(true);
        socket.setKeepAlive(true, 15000);

        return new Promise<Socket>((resolve, reject): void => {
            const onOpenError = (error: Error): void => {
                socket.destroy();
                reject(error);
            };

            socket.once("error", onOpenError);
            socket.once("ready", (): void => {
                socket.removeListener("error", onOpenError);
                logger.info(`Connected to KISS TNC at ${url.host}`, NS);
                resolve(socket);
            });

            socket.connect(Number.parseInt(url.port, 10), url.hostname);
        });
    }

    async #openSerial(): Promise<SerialPort> {
        const { path, baudRate = 9600, rtscts = false } = this.#portOptions;

        logger.debug(() => `Opening serial port with [path=${path} baudRate=${baudRate} rtscts=${rtscts}]`, NS);

        const serialPort = new SerialPort({ path, baudRate, rtscts, autoOpen: false });

        await new Promise<void>((resolve, reject): void => {
            serialPort.open((err) => (err ? reject(err) : resolve()));
        });

        logger.info(`Serial port ${path} opened`, NS);

        return serialPort;
    }

    /**
     * @param error A boolean for Socket, an Error for serialport
     */
    private onPortClose(error: boolean | Error | null): void {
        if (error) {
            logger.error("Port closed unexpectedly.", NS);
        } else {
            logger.info("Port closed.", NS);
        }

        this.tracker.stop();
    }

    private onPortError(error: Error): void {
        logger.error(`Port ${error}`, NS);

        this.tracker.stop();
    }

    /**
     * Open the port and select the radio profile. Does not start beaconing.
     */
    public async start(radioProfile: string, radioOverrides: Partial<RadioProfile> = {}): Promise<void> {
        await this.initPort();
        await this.radio.setProfile(radioProfile, radioOverrides);
    }

    public async stop(): Promise<void> {
        this.#closing = true;

        this.tracker.stop();
        await this.closePort();
    }

    public async closePort(): Promise<void> {
        const port = this.#port;

        this.#port = undefined;
        this.driver.writer.unpipe();
        this.driver.parser.removeAllListeners("data");

        if (port === undefined) {
            return;
        }

        port.unpipe();

        if (port instanceof Socket) {
            port.destroy();
        } else if (port.isOpen) {
            try {
                await new Promise<void>((resolve, reject): void => {
                    port.drain((err) => (err ? reject(err) : resolve()));
                });
                await new Promise<void>((resolve, reject): void => {
                    port.close((err) => (err ? reject(err) : resolve()));
                });
            } catch (err) {
                logger.error(`Failed to close serial port ${err}.`, NS);
            }
        }

        port.removeAllListeners();
    }
}

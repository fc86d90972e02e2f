export {
    convertMetersToFeet,
    convertToAPRSDegrees,
    encodeAPRSPosition,
    formatAPRSAltitude,
    formatAPRSLatitude,
    formatAPRSLongitude,
    formatTwoDecimals,
    type GeoFix,
    type MaybeGeoFix,
    validateGeoFix,
} from "./meshcom/aprs.js";
export { decodeASCII, EncodingError, encodeASCII, MESHCOM_NOCALL, MeshComConsts, MeshComError, meshComChecksum, MissingFieldError } from "./meshcom/meshcom.js";
export { encodeMeshComPositionFrame, MeshComPositionEncoder, type MeshComPositionOptions } from "./meshcom/meshcom-position.js";
export {
    decodeMeshComTextFrame,
    encodeMeshComTextFrame,
    type MeshComRouting,
    type MeshComTextFrame,
    type MeshComTextMessage,
    type MeshComTextParseFailure,
    type MeshComTextParseFailureReason,
    type MeshComTextParseResult,
    splitMeshComRoutingPayload,
} from "./meshcom/meshcom-text.js";
export { composeMessageId, parseNodeId, SequenceCounter } from "./meshcom/node-id.js";
export { decodeKissFrame, encodeKissFrame, KissCommand, type KissFrame, KissReservedByte } from "./drivers/kiss.js";
export { KissDriver, type KissDriverCallbacks } from "./drivers/kiss-driver.js";
export { KissParser } from "./drivers/kiss-parser.js";
export { KissWriter } from "./drivers/kiss-writer.js";
export {
    Radio,
    RADIO_PROFILES,
    type RadioCapabilities,
    type RadioDriver,
    type RadioProfile,
    type RadioProfileName,
    type RadioSetting,
} from "./radio/radio.js";
export { type BeaconMode, MeshComTracker, type TrackerCallbacks, type TrackerOptions } from "./tracker/tracker.js";
export { type Logger, logger, setLogger } from "./utils/logger.js";

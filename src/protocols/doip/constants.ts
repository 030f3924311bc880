/**
 * ISO 13400-2 (DoIP) constants.
 * @module doip/constants
 *
 * Standard references:
 * - ISO 13400-2:2012 / 2019 (Diagnostic communication over Internet Protocol)
 */
export const DOIP_DEFAULT_PORT = 13400;
export const DOIP_DEFAULT_TLS_PORT = 3496;
export const DOIP_HEADER_SIZE = 8;
export const DOIP_DEFAULT_ROUTING_ACTIVATION_TIMEOUT_MS = 2000;
export const DOIP_DEFAULT_DIAGNOSTIC_ACK_TIMEOUT_MS = 2000;
export const DOIP_DEFAULT_DISCOVERY_TIMEOUT_MS = 2000;
export const DOIP_DEFAULT_RECONNECT_DELAY_MS = 500;
export const DOIP_DEFAULT_RECONNECT_MAX_DELAY_MS = 10000;
export const DOIP_DEFAULT_MAX_BUFFER_BYTES = 1024 * 1024;
export const DOIP_DEFAULT_TESTER_ADDRESS = 0x0e00;
export const DOIP_BROADCAST_ADDRESS = '255.255.255.255';
export const DOIP_VIN_LENGTH = 17;
export const DOIP_EID_LENGTH = 6;
export const DOIP_GID_LENGTH = 6;

/** Protocol version byte carried in every header. */
export enum DoipProtocolVersion {
    Iso13400_2010 = 0x01,
    Iso13400_2012 = 0x02,
    Iso13400_2019 = 0x03,
    Iso13400_2025 = 0x04,
    /** Only valid on vehicle identification requests. */
    Default = 0xff,
}

export const DOIP_DEFAULT_PROTOCOL_VERSION = DoipProtocolVersion.Iso13400_2012;

export enum DoipPayloadType {
    GenericNack = 0x0000,
    VehicleIdentificationRequest = 0x0001,
    VehicleIdentificationRequestWithEid = 0x0002,
    VehicleIdentificationRequestWithVin = 0x0003,
    VehicleIdentificationResponse = 0x0004,
    RoutingActivationRequest = 0x0005,
    RoutingActivationResponse = 0x0006,
    AliveCheckRequest = 0x0007,
    AliveCheckResponse = 0x0008,
    EntityStatusRequest = 0x4001,
    EntityStatusResponse = 0x4002,
    DiagnosticPowerModeRequest = 0x4003,
    DiagnosticPowerModeResponse = 0x4004,
    DiagnosticMessage = 0x8001,
    DiagnosticMessageAck = 0x8002,
    DiagnosticMessageNack = 0x8003,
    PeriodicDiagnosticMessage = 0x8004,
}

/** Header NACK codes sent with payload type 0x0000. */
export enum DoipGenericNackCode {
    IncorrectPatternFormat = 0x00,
    UnknownPayloadType = 0x01,
    MessageTooLarge = 0x02,
    OutOfMemory = 0x03,
    InvalidPayloadLength = 0x04,
}

export enum DoipRoutingActivationType {
    Default = 0x00,
    WwhObd = 0x01,
    CentralSecurity = 0xe0,
}

export enum DoipRoutingActivationCode {
    UnknownSourceAddress = 0x00,
    NoMoreRoutingSlotsAvailable = 0x01,
    InvalidAddressOrRoutingType = 0x02,
    SourceAddressAlreadyRegistered = 0x03,
    Unauthorized = 0x04,
    MissingConfirmation = 0x05,
    InvalidRoutingType = 0x06,
    SecuredConnectionRequired = 0x07,
    VehicleNotReadyForRouting = 0x08,
    Success = 0x10,
    ConfirmationRequired = 0x11,
}

export enum DoipDiagnosticAckCode {
    Ack = 0x00,
}

export enum DoipDiagnosticNackCode {
    InvalidSourceAddress = 0x02,
    UnknownTargetAddress = 0x03,
    DiagnosticMessageTooLarge = 0x04,
    OutOfMemory = 0x05,
    TargetUnreachable = 0x06,
    UnknownNetwork = 0x07,
    TransportProtocolError = 0x08,
    TargetBusy = 0x09,
}

export enum DoipFurtherAction {
    None = 0x00,
    RoutingActivationRequired = 0x10,
}

export enum DoipNodeType {
    Gateway = 0x00,
    Node = 0x01,
}

export enum DoipPowerMode {
    NotReady = 0x00,
    Ready = 0x01,
    NotSupported = 0x02,
}

export const DOIP_KNOWN_PROTOCOL_VERSIONS: ReadonlySet<number> = new Set<number>([
    DoipProtocolVersion.Iso13400_2010,
    DoipProtocolVersion.Iso13400_2012,
    DoipProtocolVersion.Iso13400_2019,
    DoipProtocolVersion.Iso13400_2025,
    DoipProtocolVersion.Default,
]);

export const DOIP_KNOWN_PAYLOAD_TYPES: ReadonlySet<number> = new Set<number>([
    DoipPayloadType.GenericNack,
    DoipPayloadType.VehicleIdentificationRequest,
    DoipPayloadType.VehicleIdentificationRequestWithEid,
    DoipPayloadType.VehicleIdentificationRequestWithVin,
    DoipPayloadType.VehicleIdentificationResponse,
    DoipPayloadType.RoutingActivationRequest,
    DoipPayloadType.RoutingActivationResponse,
    DoipPayloadType.AliveCheckRequest,
    DoipPayloadType.AliveCheckResponse,
    DoipPayloadType.EntityStatusRequest,
    DoipPayloadType.EntityStatusResponse,
    DoipPayloadType.DiagnosticPowerModeRequest,
    DoipPayloadType.DiagnosticPowerModeResponse,
    DoipPayloadType.DiagnosticMessage,
    DoipPayloadType.DiagnosticMessageAck,
    DoipPayloadType.DiagnosticMessageNack,
    DoipPayloadType.PeriodicDiagnosticMessage,
]);

/** Returns `true` when `value` is one of the payload types in {@link DoipPayloadType}. */
export const isDoipPayloadType = (value: number): value is DoipPayloadType => DOIP_KNOWN_PAYLOAD_TYPES.has(value);

/** Human-readable name of a payload type, e.g. `DiagnosticMessage (0x8001)`. */
export const doipPayloadTypeName = (value: number): string => {
    const hex = `0x${value.toString(16).padStart(4, '0').toUpperCase()}`;
    return isDoipPayloadType(value) ? `${DoipPayloadType[value]} (${hex})` : `Unknown (${hex})`;
};

/**
 * ISO 14229-1 (UDS) constants.
 * @module uds/constants
 */
export const UDS_DEFAULT_REQUEST_TIMEOUT_MS = 2000;
export const UDS_DEFAULT_RESPONSE_PENDING_TIMEOUT_MS = 5000;
export const UDS_DEFAULT_MAX_RESPONSE_PENDING_EXTENSIONS = 10;
export const UDS_MAX_MESSAGE_LENGTH = 4095;
export const UDS_POSITIVE_RESPONSE_OFFSET = 0x40;
export const UDS_NEGATIVE_RESPONSE_SID = 0x7f;

export enum UdsService {
    DiagnosticSessionControl = 0x10,
    EcuReset = 0x11,
    ClearDiagnosticInformation = 0x14,
    ReadDtcInformation = 0x19,
    ReadDataByIdentifier = 0x22,
    ReadMemoryByAddress = 0x23,
    ReadScalingDataByIdentifier = 0x24,
    SecurityAccess = 0x27,
    CommunicationControl = 0x28,
    ReadDataByPeriodicIdentifier = 0x2a,
    DynamicallyDefineDataIdentifier = 0x2c,
    WriteDataByIdentifier = 0x2e,
    RequestDownload = 0x34,
    TransferData = 0x36,
    RequestTransferExit = 0x37,
    WriteMemoryByAddress = 0x3d,
    TesterPresent = 0x3e,
    AccessTimingParameters = 0x83,
    SecuredDataTransmission = 0x84,
    ControlDtcSetting = 0x85,
    ResponseOnEvent = 0x86,
    LinkControl = 0x87,
}

/** Negative response codes (ISO 14229-1 Annex A.1). */
export enum UdsNrc {
    GeneralReject = 0x10,
    ServiceNotSupported = 0x11,
    SubFunctionNotSupported = 0x12,
    IncorrectMessageLengthOrInvalidFormat = 0x13,
    ResponseTooLong = 0x14,
    BusyRepeatRequest = 0x21,
    ConditionsNotCorrect = 0x22,
    RequestSequenceError = 0x24,
    NoResponseFromSubnetComponent = 0x25,
    FailurePreventsExecutionOfRequestedAction = 0x26,
    RequestOutOfRange = 0x31,
    SecurityAccessDenied = 0x33,
    AuthenticationRequired = 0x34,
    InvalidKey = 0x35,
    ExceededNumberOfAttempts = 0x36,
    RequiredTimeDelayNotExpired = 0x37,
    SecureDataTransmissionRequired = 0x38,
    SecureDataTransmissionNotAllowed = 0x39,
    SecureDataVerificationFailed = 0x3a,
    CertificateVerificationFailedInvalidTimePeriod = 0x50,
    CertificateVerificationFailedInvalidSignature = 0x51,
    CertificateVerificationFailedInvalidChainOfTrust = 0x52,
    CertificateVerificationFailedInvalidType = 0x53,
    CertificateVerificationFailedInvalidFormat = 0x54,
    CertificateVerificationFailedInvalidContent = 0x55,
    CertificateVerificationFailedInvalidScope = 0x56,
    CertificateVerificationFailedInvalidCertificate = 0x57,
    OwnershipVerificationFailed = 0x58,
    ChallengeCalculationFailed = 0x59,
    SettingAccessRightsFailed = 0x5a,
    SessionKeyCreationOrDerivationFailed = 0x5b,
    ConfigurationDataUsageFailed = 0x5c,
    DeAuthenticationFailed = 0x5d,
    UploadDownloadNotAccepted = 0x70,
    TransferDataSuspended = 0x71,
    GeneralProgrammingFailure = 0x72,
    WrongBlockSequenceCounter = 0x73,
    ResponsePending = 0x78,
    SubFunctionNotSupportedInActiveSession = 0x7e,
    ServiceNotSupportedInActiveSession = 0x7f,
    RpmTooHigh = 0x81,
    RpmTooLow = 0x82,
    EngineIsRunning = 0x83,
    EngineIsNotRunning = 0x84,
    EngineRunTimeTooLow = 0x85,
    TemperatureTooHigh = 0x86,
    TemperatureTooLow = 0x87,
    VehicleSpeedTooHigh = 0x88,
    VehicleSpeedTooLow = 0x89,
    ThrottlePedalTooHigh = 0x8a,
    ThrottlePedalTooLow = 0x8b,
    TransmissionRangeNotInNeutral = 0x8c,
    TransmissionRangeNotInGear = 0x8d,
    BrakeSwitchNotClosed = 0x8f,
    ShifterLeverNotInPark = 0x90,
    TorqueConverterClutchLocked = 0x91,
    VoltageTooHigh = 0x92,
    VoltageTooLow = 0x93,
    ResourceTemporarilyNotAvailable = 0x94,
}

export enum DiagnosticSession {
    Default = 0x01,
    Programming = 0x02,
    Extended = 0x03,
    SafetySystem = 0x04,
}

export enum EcuResetType {
    HardReset = 0x01,
    KeyOffOnReset = 0x02,
    SoftReset = 0x03,
    EnableRapidPowerShutDown = 0x04,
    DisableRapidPowerShutDown = 0x05,
}

/** Well-known data identifiers (ISO 14229-1 Annex C.1). */
export enum DataIdentifier {
    BootSoftwareIdentification = 0xf180,
    ApplicationSoftwareIdentification = 0xf181,
    ActiveDiagnosticSession = 0xf186,
    SparePartNumber = 0xf187,
    EcuSoftwareNumber = 0xf188,
    EcuSoftwareVersionNumber = 0xf189,
    SystemSupplierIdentifier = 0xf18a,
    EcuManufacturingDate = 0xf18b,
    EcuSerialNumber = 0xf18c,
    Vin = 0xf190,
    EcuHardwareNumber = 0xf191,
    SystemSupplierEcuHardwareNumber = 0xf192,
    SystemSupplierEcuHardwareVersionNumber = 0xf193,
    SystemSupplierEcuSoftwareNumber = 0xf194,
    SystemSupplierEcuSoftwareVersionNumber = 0xf195,
    SystemName = 0xf197,
    RepairShopCodeOrTesterSerialNumber = 0xf198,
    ProgrammingDate = 0xf199,
}

/**
 * Minimum positive response length per service, including the response SID.
 * Services not listed need at least the response SID.
 */
export const UDS_MIN_POSITIVE_RESPONSE_LENGTH: ReadonlyMap<number, number> = new Map<number, number>([
    [UdsService.DiagnosticSessionControl, 6],
    [UdsService.EcuReset, 2],
    [UdsService.SecurityAccess, 2],
    [UdsService.CommunicationControl, 2],
    [UdsService.TesterPresent, 2],
    [UdsService.ReadDataByIdentifier, 4],
    [UdsService.WriteDataByIdentifier, 3],
    [UdsService.WriteMemoryByAddress, 3],
    [UdsService.ClearDiagnosticInformation, 1],
    [UdsService.ReadDtcInformation, 2],
    [UdsService.RequestDownload, 3],
    [UdsService.TransferData, 2],
    [UdsService.RequestTransferExit, 1],
    [UdsService.ControlDtcSetting, 2],
    [UdsService.LinkControl, 2],
]);

/** Negative responses are always `0x7F SID NRC`. */
export const UDS_NEGATIVE_RESPONSE_LENGTH = 3;

export const isUdsService = (value: number): value is UdsService => typeof UdsService[value] === 'string';

const hexByte = (value: number): string => `0x${value.toString(16).padStart(2, '0').toUpperCase()}`;

/** Enum name of a negative response code, e.g. `RequestOutOfRange`. */
export const nrcName = (code: number): string => UdsNrc[code] ?? 'UnknownNrc';

/** Enum name of a request service id, e.g. `ReadDataByIdentifier`. */
export const serviceName = (serviceId: number): string => (isUdsService(serviceId) ? UdsService[serviceId] : 'UnknownService');

/**
 * Readable one-line description of a negative response, e.g.
 * `WriteDataByIdentifier (0x2E) rejected: RequestOutOfRange (NRC 0x31)`.
 */
export const describeNegativeResponse = (serviceId: number, responseCode: number): string =>
    `${serviceName(serviceId)} (${hexByte(serviceId)}) rejected: ${nrcName(responseCode)} (NRC ${hexByte(responseCode)})`;

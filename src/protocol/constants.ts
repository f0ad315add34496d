/**
 * Remote-control ("iapp") protocol constants.
 * @module protocol/constants
 *
 * Payload values were captured from D-series TV sets and home theatre
 * receivers; the meaning of the status payloads is inferred.
 */
export const DEFAULT_PORT = 55000;
export const DEFAULT_AUTH_TIMEOUT_MS = 20000;
export const DEFAULT_RECV_TIMEOUT_MS = 2000;
export const DEFAULT_MAX_AUTH_ATTEMPTS = 3;
export const DEFAULT_CHANNEL_KEY_DELAY_MS = 100;

/** Largest payload a little-endian u16 length prefix can describe. */
export const MAX_STRING_LENGTH = 0xffff;

/** Appended to the app label to form the sender field of every outbound frame. */
export const APP_SENDER_SUFFIX = '.iapp.samsung';

export const AUTH_REQUEST_PREFIX = Buffer.from([0x64, 0x00]);
export const KEY_COMMAND_PREFIX = Buffer.from([0x00, 0x00, 0x00]);
export const TEXT_COMMAND_PREFIX = Buffer.from([0x01, 0x00]);

/** Mode byte of outbound command frames. */
export enum CommandMode {
    Key = 0x00,
    Text = 0x01,
}

/** Known values of the kind byte of inbound messages. */
export enum MessageKind {
    KeyConfirm = 0x00,
    KeyConfirmMenu = 0x01,
    StateChange = 0x02,
    Timeshift = 0x04,
}

export type ResponsePayloadName =
    | 'AuthOk'
    | 'AuthAccessDenied'
    | 'AuthNeedConfirmation'
    | 'AuthTimeout'
    | 'KeyOk'
    | 'StatusShowingMenu'
    | 'StatusShowingTv'
    | 'StatusShowingTtx'
    | 'StatusShowingOverlay';

/** Payloads the device is known to send. */
export const ResponsePayload: Readonly<Record<ResponsePayloadName, Buffer>> = {
    AuthOk: Buffer.from([0x64, 0x00, 0x01, 0x00]),
    AuthAccessDenied: Buffer.from([0x64, 0x00, 0x00, 0x00]),
    // sent while the TV asks its user to allow the app
    AuthNeedConfirmation: Buffer.from([0x0a, 0x00, 0x02, 0x00, 0x00, 0x00]),
    AuthTimeout: Buffer.from([0x64, 0x00]),
    KeyOk: Buffer.from([0x00, 0x00, 0x00, 0x00]),
    StatusShowingMenu: Buffer.from([0x10, 0x00, 0x02, 0x00, 0x00, 0x00]),
    StatusShowingTv: Buffer.from([0x10, 0x00, 0x01, 0x00, 0x00, 0x00]),
    StatusShowingTtx: Buffer.from([0x10, 0x00, 0x0c, 0x00, 0x00, 0x00]),
    StatusShowingOverlay: Buffer.from([0x10, 0x00, 0x18, 0x00, 0x00, 0x00]),
};

const RESPONSE_PAYLOAD_NAMES: readonly ResponsePayloadName[] = [
    'AuthOk',
    'AuthAccessDenied',
    'AuthNeedConfirmation',
    'AuthTimeout',
    'KeyOk',
    'StatusShowingMenu',
    'StatusShowingTv',
    'StatusShowingTtx',
    'StatusShowingOverlay',
];

/**
 * Look up the name of a known payload.
 * @returns The payload name, or `null` for payloads not listed in {@link ResponsePayload}.
 */
export const identifyPayload = (payload: Uint8Array): ResponsePayloadName | null =>
    RESPONSE_PAYLOAD_NAMES.find((name) => ResponsePayload[name].equals(payload)) ?? null;

/**
 * Local network identity used in the handshake.
 * @module core/network
 */
import {randomBytes} from 'crypto';
import {networkInterfaces} from 'os';

/** Supplies the MAC address announced for a given local IP. */
export type MacAddressSource = (localAddress: string) => string;

const ZERO_MAC = '00:00:00:00:00:00';
const MAC_PATTERN = /^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/i;

export const isMacAddress = (value: string): boolean => MAC_PATTERN.test(value);

/** Format six bytes as colon-separated lowercase hex octets. */
export const formatMac = (bytes: Uint8Array): string => {
    if (bytes.length !== 6) {
        throw new RangeError(`MAC address must be 6 bytes, got ${bytes.length}`);
    }
    return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join(':');
};

let fallbackMac: string | null = null;

/**
 * Random locally administered unicast address, generated once per process.
 */
export const processMac = (): string => {
    if (!fallbackMac) {
        const bytes = randomBytes(6);
        bytes[0] = (bytes[0] | 0x02) & 0xfe;
        fallbackMac = formatMac(bytes);
    }
    return fallbackMac;
};

/** Strip the IPv4-mapped IPv6 prefix (`::ffff:`). */
export const normalizeAddress = (address: string): string =>
    address.toLowerCase().startsWith('::ffff:') && address.includes('.') ? address.substring(7) : address;

/**
 * Resolve the MAC of the interface that owns `localAddress`.
 * Falls back to the first external interface, then to {@link processMac}.
 */
export const resolveLocalMac: MacAddressSource = (localAddress) => {
    const address = normalizeAddress(localAddress);
    const candidates = Object.values(networkInterfaces())
        .flatMap((entries) => entries ?? [])
        .filter((entry) => entry.mac !== ZERO_MAC);
    const match = candidates.find((entry) => entry.address === address)
        ?? candidates.find((entry) => !entry.internal);
    return match ? match.mac : processMac();
};

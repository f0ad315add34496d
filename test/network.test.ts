import {networkInterfaces, type NetworkInterfaceInfo} from 'os';
import {beforeEach, describe, expect, it, vi} from 'vitest';

import {formatMac, isMacAddress, normalizeAddress, processMac, resolveLocalMac} from '../src';

vi.mock('os', async (importOriginal) => {
    const actual = await importOriginal<typeof import('os')>();
    return {...actual, networkInterfaces: vi.fn(() => ({}))};
});

const ipv4 = (address: string, mac: string, internal = false): NetworkInterfaceInfo => ({
    address,
    netmask: '255.255.255.0',
    family: 'IPv4',
    mac,
    internal,
    cidr: `${address}/24`,
});

describe('formatMac', () => {
    it('formats six bytes as lowercase hex', () => {
        expect(formatMac(Uint8Array.from([0xaa, 0x0b, 0xcc, 0x01, 0xee, 0xff]))).toBe('aa:0b:cc:01:ee:ff');
    });

    it('rejects other lengths', () => {
        expect(() => formatMac(Uint8Array.from([1, 2, 3]))).toThrow(RangeError);
    });
});

describe('normalizeAddress', () => {
    it('strips the IPv4-mapped prefix', () => {
        expect(normalizeAddress('::ffff:192.168.1.50')).toBe('192.168.1.50');
        expect(normalizeAddress('192.168.1.50')).toBe('192.168.1.50');
        expect(normalizeAddress('::ffff:1')).toBe('::ffff:1');
        expect(normalizeAddress('fe80::1')).toBe('fe80::1');
    });
});

describe('processMac', () => {
    it('returns one locally administered unicast address per process', () => {
        const mac = processMac();
        expect(isMacAddress(mac)).toBe(true);
        const firstOctet = parseInt(mac.substring(0, 2), 16);
        expect(firstOctet & 0x02).toBe(0x02);
        expect(firstOctet & 0x01).toBe(0x00);
        expect(processMac()).toBe(mac);
    });
});

describe('resolveLocalMac', () => {
    const mockedInterfaces = vi.mocked(networkInterfaces);

    beforeEach(() => {
        mockedInterfaces.mockReset();
    });

    it('uses the interface that owns the local address', () => {
        mockedInterfaces.mockReturnValue({
            lo: [ipv4('127.0.0.1', '00:00:00:00:00:00', true)],
            eth0: [ipv4('10.0.0.5', '11:22:33:44:55:66')],
            wlan0: [ipv4('192.168.1.50', 'aa:bb:cc:dd:ee:ff')],
        });
        expect(resolveLocalMac('::ffff:192.168.1.50')).toBe('aa:bb:cc:dd:ee:ff');
    });

    it('falls back to the first external interface', () => {
        mockedInterfaces.mockReturnValue({
            lo: [ipv4('127.0.0.1', '00:00:00:00:00:00', true)],
            eth0: [ipv4('10.0.0.5', '11:22:33:44:55:66')],
        });
        expect(resolveLocalMac('192.168.1.50')).toBe('11:22:33:44:55:66');
    });

    it('falls back to the process address without usable interfaces', () => {
        mockedInterfaces.mockReturnValue({
            lo: [ipv4('127.0.0.1', '00:00:00:00:00:00', true)],
        });
        expect(resolveLocalMac('127.0.0.1')).toBe(processMac());
    });
});

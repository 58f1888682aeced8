import { deepEqual, notStrictEqual, ok, strictEqual } from 'assert'
import { cloneDeep } from 'lodash'
import {
    Anonymizer,
    anonymize,
    anonymizeIpv4,
    anonymizeIpv6,
    anonymizeMac,
    anonymizeText,
    compressIpv6,
    createSequenceRandomSource,
    DEFAULT_SSID_PLACEHOLDERS,
    expandIpv6,
    findIpv4Addresses,
    findIpv6Addresses,
    findMacAddresses,
    ReplacementStore,
    replaceSpans,
    selectValuePolicy,
    type JsonValue
} from '.'
import { anonymizeSsid, generatePassword, generateSerialNumber } from './rules'

function contextOf(values: number[]) {
    return { store: new ReplacementStore, random: createSequenceRandomSource(values) }
}

describe('Anonymizer', () => {

    describe('matchers', () => {
        it('finds MAC addresses with a consistent delimiter', () => {
            const spans = findMacAddresses('wan 00:11:22:33:44:55 lan aa-bb-cc-dd-ee-ff mixed 00:11-22:33:44:55')

            deepEqual(spans.map(span => span.text), ['00:11:22:33:44:55', 'aa-bb-cc-dd-ee-ff'])
            deepEqual(spans[0], { start: 4, end: 21, text: '00:11:22:33:44:55' })
        })

        it('finds IPv4 addresses', () => {
            deepEqual(
                findIpv4Addresses('gw 192.168.1.1, dns 8.8.8.8 v1.2.3').map(span => span.text),
                ['192.168.1.1', '8.8.8.8']
            )
        })

        it('finds IPv6 addresses but not MAC addresses', () => {
            deepEqual(
                findIpv6Addresses('addr 2001:db8::1 mac AA:BB:CC:DD:EE:FF time 12:30 ns std::cout').map(span => span.text),
                ['2001:db8::1', '12:30']
            )
        })

        it('finds IPv6 addresses after a colon or before a final period', () => {
            deepEqual(
                findIpv6Addresses('ipv6:2001:db8::1 gw fe80::1234:5678. end').map(span => span.text),
                ['2001:db8::1', 'fe80::1234:5678']
            )
            deepEqual(findIpv6Addresses('mapped ::ffff:10.1.2.3'), [])
        })

        it('anonymizes IPv6 addresses in free text', () => {
            strictEqual(
                anonymizeText('ipv6:2001:0db8:aaaa:bbbb:cccc:dddd:eeee:ffff', contextOf([0xbeef])),
                'ipv6:2001:beef:beef:beef:beef:beef:beef:beef'
            )
            strictEqual(
                anonymizeText('Address is 2001:0db8:aaaa:bbbb:cccc:dddd:eeee:ffff.', contextOf([0xbeef])),
                'Address is 2001:beef:beef:beef:beef:beef:beef:beef.'
            )
            strictEqual(anonymizeText('gw fe80::1234:5678.', contextOf([0xbeef])), 'gw fe80::beef:beef.')
        })

        it('replaces spans and keeps the remaining text', () => {
            const text = 'a 1.2.3.4 b 5.6.7.8'
            strictEqual(
                replaceSpans(text, findIpv4Addresses(text), ip => '<' + ip + '>'),
                'a <1.2.3.4> b <5.6.7.8>'
            )
        })
    })

    describe('rules', () => {
        it('keeps the MAC vendor part and memoizes', () => {
            const context = contextOf([0x12, 0xab, 0x05])

            strictEqual(anonymizeMac('aa:bb:cc:dd:ee:ff', context), 'AA:BB:CC:12:AB:05')
            strictEqual(anonymizeMac('aa:bb:cc:dd:ee:ff', context), 'AA:BB:CC:12:AB:05')
            strictEqual(anonymizeMac('00-11-22-33-44-55', context), '00-11-22-12-AB-05')
            strictEqual(context.store.size, 2)
        })

        it('keeps special IPv4 addresses', () => {
            const context = contextOf([100])

            for (const ip of ['127.0.0.1', '0.0.0.0', '255.255.255.255', '255.255.255.0', '192.168.1.1', '192.168.1.0', '192.168.1.255', '300.1.1.1']) {
                strictEqual(anonymizeIpv4(ip, context), ip)
            }
        })

        it('randomizes the host of private 192.168 addresses', () => {
            strictEqual(anonymizeIpv4('192.168.1.50', contextOf([77])), '192.168.1.77')
        })

        it('moves other IPv4 addresses to 10/8', () => {
            strictEqual(anonymizeIpv4('8.8.8.8', contextOf([3, 200, 42])), '10.3.200.42')
            strictEqual(anonymizeIpv4('172.16.5.1', contextOf([7, 9])), '10.7.9.1')
            strictEqual(anonymizeIpv4('172.16.5.255', contextOf([7, 9])), '10.7.9.255')
        })

        it('expands and compresses IPv6 addresses', () => {
            deepEqual(expandIpv6('2001:DB8::1'), ['2001', '0db8', '0000', '0000', '0000', '0000', '0000', '0001'])
            deepEqual(expandIpv6('::'), ['0000', '0000', '0000', '0000', '0000', '0000', '0000', '0000'])
            strictEqual(compressIpv6(['2001', '0db8', '0000', '0001', '0000', '0000', '0000', '0001']), '2001:db8:0:1::1')
            strictEqual(compressIpv6(['fe80', '0000', '0000', '0001', '0000', '0000', '0002', '0003']), 'fe80::1:0:0:2:3')
            strictEqual(compressIpv6(['0000', '0000', '0000', '0000', '0000', '0000', '0000', '0000']), '::')
            strictEqual(compressIpv6(['2001', '0db8', '0000', '0001', '0002', '0003', '0004', '0005']), '2001:db8:0:1:2:3:4:5')
        })

        it('keeps the first IPv6 group and the 0/1 groups', () => {
            const context = contextOf([0xbeef])

            strictEqual(anonymizeIpv6('2001:0db8:0000:0001:0000:0000:0000:0001', context), '2001:beef:0:1::1')
            strictEqual(anonymizeIpv6('12:30', context), '12:30')
        })

        it('assigns consistent SSID placeholders', () => {
            const context = contextOf([2, 0])
            const placeholders = ['A', 'B', 'C']

            strictEqual(anonymizeSsid('HomeNet', placeholders, context), 'C')
            strictEqual(anonymizeSsid('Office', placeholders, context), 'A')
            strictEqual(anonymizeSsid('HomeNet', placeholders, context), 'C')
        })

        it('generates passwords and serial numbers', () => {
            strictEqual(generatePassword(createSequenceRandomSource([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11])), 'ABCDEFGHIJKL')
            strictEqual(
                generateSerialNumber(createSequenceRandomSource([0, 25, 1, 2, 3, 4, 5, 6, 7, 8, 9, 0, 1, 2])),
                'AZ123456789012'
            )
        })
    })

    describe('value policy', () => {
        it('selects by key with precedence', () => {
            const cases: Array<[string | undefined, string, string]> = [
                ['firmware_version', '1.2.3', 'keep'],
                ['SoftwareVersion', '192.168.1.50', 'keep'],
                ['ssid_reference', 'Device.WiFi.SSID.1', 'keep'],
                ['ipv6_prefix', '2001:db8::/64', 'keep'],
                ['prefix_length', '64', 'content'],
                ['serial_number', 'X', 'serialNumber'],
                ['Serial_Number', 'X', 'serialNumber'],
                ['serial_number_2', 'X', 'content'],
                ['admin_password', 'x', 'password'],
                ['wpa_passphrase', 'x', 'password'],
                ['password_version', 'x', 'keep'],
                ['ssid', 'Home', 'ssid'],
                ['ssid_name', 'Home', 'content'],
                ['bssid', '00:11:22:33:44:55', 'bssid'],
                [undefined, 'x', 'content']
            ]

            for (const [key, value, policy] of cases) {
                strictEqual(selectValuePolicy(key, value), policy, String(key))
            }
        })

        it('only scans MAC addresses in bssid', () => {
            const anonymizer = new Anonymizer({ serialNumber: 'TS000000000000', random: createSequenceRandomSource([1, 2, 3]) })

            strictEqual(anonymizer.anonymizeValue('bssid', '8.8.8.8 00:11:22:33:44:55'), '8.8.8.8 00:11:22:01:02:03')
        })

        it('leaves non string and empty values', () => {
            const anonymizer = new Anonymizer

            strictEqual(anonymizer.anonymizeValue('serial_number', ''), '')
            strictEqual(anonymizer.anonymizeValue('password', 1234), 1234)
            strictEqual(anonymizer.anonymizeValue('ssid', null), null)
            strictEqual(anonymizer.anonymizeValue('ssid', true), true)
        })

        it('keeps version values', () => {
            const anonymizer = new Anonymizer

            for (const value of ['1.0.3', '00:11:22:33:44:55', '8.8.8.8', 'fe80::1234:5678']) {
                strictEqual(anonymizer.anonymizeValue('version', value), value)
                strictEqual(anonymizer.anonymizeValue('HardwareVersion', value), value)
            }
        })
    })

    describe('documents', () => {
        it('anonymizes a device status', () => {
            const anonymized = anonymize({
                status: { ssid: 'HomeNet-5G', bssid: '00:11:22:33:44:55' },
                mac_address: '00:11:22:33:44:55',
                version: '1.0.3'
            })

            ok(anonymized !== null && typeof anonymized === 'object' && !Array.isArray(anonymized))
            const status = anonymized.status
            ok(status !== null && typeof status === 'object' && !Array.isArray(status))

            ok(typeof status.ssid === 'string' && DEFAULT_SSID_PLACEHOLDERS.includes(status.ssid))
            strictEqual(status.bssid, anonymized.mac_address)
            ok(typeof status.bssid === 'string' && /^00:11:22(:[0-9A-F]{2}){3}$/.test(status.bssid))
            strictEqual(anonymized.version, '1.0.3')
        })

        it('keeps the document structure without mutating it', () => {
            const document: JsonValue = {
                device: {
                    serial_number: 'AB123',
                    interfaces: [
                        { name: 'wan', mac: 'aa:bb:cc:dd:ee:ff', ips: ['8.8.4.4', '2001:db8::42'] },
                        { name: 'lan', mac: '', enabled: false, mtu: 1500 }
                    ],
                    empty: {},
                    nothing: null,
                    matrix: [[1, 2], [], ['192.168.0.20']]
                },
                docsis: { downstream: [{ power: -2.5, snr: 40.1, codewords: 123456 }] }
            }
            const original = cloneDeep(document)
            const anonymized = anonymize(document, { serialNumber: 'TS000000000000', random: createSequenceRandomSource([5, 6, 7, 8]) })

            deepEqual(document, original)
            deepEqual(anonymized, {
                device: {
                    serial_number: 'TS000000000000',
                    interfaces: [
                        { name: 'wan', mac: 'AA:BB:CC:05:06:07', ips: ['10.8.5.6', '2001:7::8'] },
                        { name: 'lan', mac: '', enabled: false, mtu: 1500 }
                    ],
                    empty: {},
                    nothing: null,
                    matrix: [[1, 2], [], ['192.168.0.5']]
                },
                docsis: { downstream: [{ power: -2.5, snr: 40.1, codewords: 123456 }] }
            })
            deepEqual(Object.keys(anonymized ?? {}), ['device', 'docsis'])
        })

        it('keeps "__proto__" keys as plain fields', () => {
            const anonymized = anonymize(
                JSON.parse('{"__proto__": {"mac": "00:11:22:33:44:55"}, "a": 1}'),
                { serialNumber: 'TS000000000000', random: createSequenceRandomSource([1, 2, 3]) }
            )

            deepEqual(Object.entries(anonymized ?? {}), [
                ['__proto__', { mac: '00:11:22:01:02:03' }],
                ['a', 1]
            ])
            strictEqual(Object.getPrototypeOf(anonymized), Object.prototype)
        })

        it('uses one fake serial number for the whole run', () => {
            const anonymizer = new Anonymizer

            const first = anonymizer.anonymize({ serial_number: 'AAA111' })
            const second = anonymizer.anonymize({ info: { serial_number: 'BBB222' } })

            deepEqual(first, { serial_number: anonymizer.getSerialNumber() })
            deepEqual(second, { info: { serial_number: anonymizer.getSerialNumber() } })
            ok(/^[A-Z]{2}\d{12}$/.test(anonymizer.getSerialNumber()))
        })

        it('does not memoize passwords', () => {
            const anonymizer = new Anonymizer({
                serialNumber: 'TS000000000000',
                random: createSequenceRandomSource([...Array(24).keys()])
            })

            deepEqual(
                anonymizer.anonymize({ a: { password: 'same' }, b: { password: 'same' } }),
                { a: { password: 'ABCDEFGHIJKL' }, b: { password: 'MNOPQRSTUVWX' } }
            )
            strictEqual(anonymizer.getStore().size, 0)
        })

        it('keeps replacements consistent within a run', () => {
            const anonymizer = new Anonymizer
            const result = anonymizer.anonymize({
                gateway: '8.8.8.8',
                dns: ['8.8.8.8', 'primary 8.8.8.8'],
                ssid: 'HomeNet',
                backup: { ssid: 'HomeNet' }
            })

            ok(result !== null && typeof result === 'object' && !Array.isArray(result))
            deepEqual(result.dns, [result.gateway, 'primary ' + String(result.gateway)])
            deepEqual(result.backup, { ssid: result.ssid })
        })

        it('isolates runs unless a store is shared', () => {
            const store = new ReplacementStore
            const first = new Anonymizer({ store, random: createSequenceRandomSource([1]) })
            const second = new Anonymizer({ store, random: createSequenceRandomSource([2]) })
            const isolated = new Anonymizer({ random: createSequenceRandomSource([3]) })

            const firstMac = first.anonymizeValue('mac', 'aa:bb:cc:dd:ee:ff')

            strictEqual(second.anonymizeValue('mac', 'aa:bb:cc:dd:ee:ff'), firstMac)
            notStrictEqual(isolated.anonymizeValue('mac', 'aa:bb:cc:dd:ee:ff'), firstMac)
            strictEqual(isolated.getStore().size, 1)
        })

        it('counts changes per policy', () => {
            const anonymizer = new Anonymizer({ serialNumber: 'TS000000000000' })
            anonymizer.anonymize({ ssid: 'Home', info: 'gw 8.8.8.8', version: '1.0', name: 'router' })

            deepEqual(anonymizer.stats(), { keep: 0, serialNumber: 0, password: 0, ssid: 1, bssid: 0, content: 1 })
        })
    })
})

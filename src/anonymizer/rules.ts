import { isIPv6 } from 'net'
import type { RandomSource } from './random'
import type { ReplacementStore } from './replacement-store'

export interface RuleContext {
    store: ReplacementStore
    random: RandomSource
}

const ALPHANUMERICS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789'
const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ'
const PASSWORD_LENGTH = 12
const SERIAL_NUMBER_DIGITS = 12

function randomChars(alphabet: string, length: number, random: RandomSource) {
    let chars = ''
    for (let i = 0; i < length; i++) {
        chars += alphabet[random.integer(0, alphabet.length - 1)]
    }
    return chars
}

function randomHex(digits: number, random: RandomSource) {
    return random.integer(0, 16 ** digits - 1).toString(16).padStart(digits, '0')
}

export function generateSerialNumber(random: RandomSource): string {
    return randomChars(LETTERS, 2, random) + randomChars('0123456789', SERIAL_NUMBER_DIGITS, random)
}

export function generatePassword(random: RandomSource): string {
    return randomChars(ALPHANUMERICS, PASSWORD_LENGTH, random)
}

/**
 * Keeps the OUI (vendor part), randomizes the device part
 */
export function anonymizeMac(address: string, { store, random }: RuleContext): string {
    return store.getOrCreate('mac', address, () => {
        const delimiter = address[2]
        const octets = address.split(delimiter)

        return octets.slice(0, 3)
            .concat([randomHex(2, random), randomHex(2, random), randomHex(2, random)])
            .join(delimiter)
            .toUpperCase()
    })
}

export function anonymizeIpv4(address: string, { store, random }: RuleContext): string {
    const octets = address.split('.').map(octet => parseInt(octet, 10))

    if (octets.length !== 4 || octets.some(octet => octet > 255)) {
        return address
    }

    const isLoopback = octets[0] === 127
    const isUnspecified = octets.every(octet => octet === 0)

    if (isLoopback || isUnspecified || address.startsWith('255.')) {
        return address
    }

    const keepsLastOctet = [0, 1, 255].includes(octets[3])

    return store.getOrCreate('ipv4', address, () => {
        if (octets[0] === 192 && octets[1] === 168) {
            return keepsLastOctet
                ? address
                : [192, 168, octets[2], random.integer(2, 254)].join('.')
        }

        return [
            10,
            random.integer(0, 255),
            random.integer(0, 255),
            keepsLastOctet ? octets[3] : random.integer(2, 254)
        ].join('.')
    })
}

/**
 * Eight lowercase 4-digit groups. Address must be a valid IPv6 without
 * embedded IPv4 or zone.
 */
export function expandIpv6(address: string): string[] {
    const [head, tail] = address.split('::')
    const headGroups = head ? head.split(':') : []

    let groups = headGroups

    if (tail !== undefined) {
        const tailGroups = tail ? tail.split(':') : []
        const zeros = new Array<string>(8 - headGroups.length - tailGroups.length).fill('0')
        groups = [...headGroups, ...zeros, ...tailGroups]
    }

    return groups.map(group => group.toLowerCase().padStart(4, '0'))
}

/**
 * RFC 5952 text form
 */
export function compressIpv6(groups: string[]): string {
    const hextets = groups.map(group => parseInt(group, 16).toString(16))

    let bestStart = -1
    let bestLength = 0
    let currentStart = -1

    hextets.forEach((hextet, i) => {
        if (hextet !== '0') {
            currentStart = -1
            return
        }
        if (currentStart === -1) {
            currentStart = i
        }
        if (i - currentStart + 1 > bestLength) {
            bestStart = currentStart
            bestLength = i - currentStart + 1
        }
    })

    if (bestLength < 2) {
        return hextets.join(':')
    }

    return hextets.slice(0, bestStart).join(':')
        + '::'
        + hextets.slice(bestStart + bestLength).join(':')
}

export function anonymizeIpv6(address: string, { store, random }: RuleContext): string {
    if (!isIPv6(address) || address.includes('.')) {
        return address
    }

    return store.getOrCreate('ipv6', address, () => {
        const [first, ...others] = expandIpv6(address)

        return compressIpv6([
            first,
            ...others.map(group => ['0000', '0001'].includes(group) ? group : randomHex(4, random))
        ])
    })
}

export function anonymizeSsid(ssid: string, placeholders: readonly string[], { store, random }: RuleContext): string {
    return store.getOrCreate('ssid', ssid, () => random.pick(placeholders))
}

import { scanIpv4Addresses, scanIpv6Addresses, scanMacAddresses } from './matchers'
import { anonymizeIpv4, anonymizeIpv6, anonymizeMac, anonymizeSsid, generatePassword, type RuleContext } from './rules'

export type JsonScalar = string | number | boolean | null
export type JsonValue = JsonScalar | JsonValue[] | { [key: string]: JsonValue }

export type ValuePolicy = 'keep' | 'serialNumber' | 'password' | 'ssid' | 'bssid' | 'content'

export interface PolicyContext extends RuleContext {
    serialNumber: string
    ssidPlaceholders: readonly string[]
}

/**
 * Some keys are compared exactly and others by containment, both on the
 * lowercased key. Which is which decides what gets anonymized.
 */
export function selectValuePolicy(key: string | undefined, value: string): ValuePolicy {
    const lowerKey = (key ?? '').toLowerCase()

    if (lowerKey.includes('version') || lowerKey.includes('ssid_reference')) {
        return 'keep'
    }

    // IPv6 prefixes
    if (lowerKey.includes('prefix') && value.includes(':')) {
        return 'keep'
    }

    if (lowerKey === 'serial_number') {
        return 'serialNumber'
    }

    if (lowerKey.includes('password') || lowerKey.includes('passphrase')) {
        return 'password'
    }

    if (lowerKey === 'ssid') {
        return 'ssid'
    }

    if (lowerKey === 'bssid') {
        return 'bssid'
    }

    return 'content'
}

export function anonymizeText(text: string, context: RuleContext): string {
    let anonymized = scanMacAddresses(text, mac => anonymizeMac(mac, context))
    anonymized = scanIpv4Addresses(anonymized, ip => anonymizeIpv4(ip, context))
    return scanIpv6Addresses(anonymized, ip => anonymizeIpv6(ip, context))
}

export function applyValuePolicy(policy: ValuePolicy, value: string, context: PolicyContext): string {
    switch (policy) {
        case 'keep':
            return value
        case 'serialNumber':
            return context.serialNumber
        case 'password':
            // Never memoized
            return generatePassword(context.random)
        case 'ssid':
            return anonymizeSsid(value, context.ssidPlaceholders, context)
        case 'bssid':
            return scanMacAddresses(value, mac => anonymizeMac(mac, context))
        case 'content':
            return anonymizeText(value, context)
    }
}

import { createRandomSource, type RandomSource } from './random'
import { ReplacementStore } from './replacement-store'
import { applyValuePolicy, selectValuePolicy, type JsonValue, type PolicyContext, type ValuePolicy } from './policy'
import { generateSerialNumber } from './rules'

export const DEFAULT_SSID_PLACEHOLDERS: readonly string[] = [
    'Tell my WiFi love her',
    'Pretty Fly for a Wi-Fi',
    'The LAN Before Time',
    'Searching...',
    'Get off my LAN'
]

export interface AnonymizerOpts {
    /** Share a store between runs to keep replacements consistent across documents */
    store?: ReplacementStore
    random?: RandomSource
    ssidPlaceholders?: readonly string[]
    /** Fake serial number used for every serial_number field. Generated when missing */
    serialNumber?: string
}

export type AnonymizationStats = Record<ValuePolicy, number>

function createStats(): AnonymizationStats {
    return { keep: 0, serialNumber: 0, password: 0, ssid: 0, bssid: 0, content: 0 }
}

/**
 * One anonymization run. All documents given to the same instance share
 * its replacements and its fake serial number.
 */
export class Anonymizer {
    protected context: PolicyContext
    protected changes: AnonymizationStats = createStats()

    constructor(opts: AnonymizerOpts = {}) {
        const random = opts.random || createRandomSource()
        const ssidPlaceholders = opts.ssidPlaceholders || DEFAULT_SSID_PLACEHOLDERS

        if (ssidPlaceholders.length === 0) {
            throw new Error('At least one SSID placeholder is required')
        }

        this.context = {
            store: opts.store || new ReplacementStore,
            random,
            ssidPlaceholders,
            serialNumber: opts.serialNumber || generateSerialNumber(random)
        }
    }

    public getSerialNumber() {
        return this.context.serialNumber
    }

    public getStore() {
        return this.context.store
    }

    /**
     * Number of values changed, per policy
     */
    public stats(): AnonymizationStats {
        return {...this.changes}
    }

    public anonymizeValue<T extends JsonValue>(key: string | undefined, value: T): T | string {
        if (typeof value !== 'string' || value === '') {
            return value
        }

        const policy = selectValuePolicy(key, value)
        const anonymized = applyValuePolicy(policy, value, this.context)

        if (anonymized !== value) {
            this.changes[policy]++
        }

        return anonymized
    }

    /**
     * Returns a new document with the same shape. Only object values get
     * their key; array items and a scalar root are scanned by content.
     */
    public anonymize(document: JsonValue): JsonValue {
        return this.walk(document, undefined)
    }

    protected walk(node: JsonValue, key: string | undefined): JsonValue {
        if (Array.isArray(node)) {
            return node.map(item => this.walk(item, undefined))
        }

        if (node !== null && typeof node === 'object') {
            // fromEntries defines own properties, so "__proto__" keys survive
            return Object.fromEntries(
                Object.entries(node).map(([childKey, child]): [string, JsonValue] => [childKey, this.walk(child, childKey)])
            )
        }

        return typeof node === 'string' ? this.anonymizeValue(key, node) : node
    }
}

export function anonymize(document: JsonValue, opts?: AnonymizerOpts): JsonValue {
    return (new Anonymizer(opts)).anonymize(document)
}

export { ReplacementStore } from './replacement-store'
export type { ReplacementEntry, ReplacementKind } from './replacement-store'
export { createRandomSource, createSequenceRandomSource } from './random'
export type { RandomSource } from './random'
export { selectValuePolicy, anonymizeText } from './policy'
export type { JsonValue, JsonScalar, ValuePolicy } from './policy'
export { findMacAddresses, findIpv4Addresses, findIpv6Addresses, replaceSpans } from './matchers'
export type { MatchSpan } from './matchers'
export { anonymizeMac, anonymizeIpv4, anonymizeIpv6, expandIpv6, compressIpv6 } from './rules'

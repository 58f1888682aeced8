export interface MatchSpan {
    start: number
    end: number
    text: string
}

export type SpanReplacer = (text: string) => string

const MAC_PATTERN = /\b[0-9A-Fa-f]{2}([:-])[0-9A-Fa-f]{2}(?:\1[0-9A-Fa-f]{2}){4}\b/g
const IPV4_PATTERN = /\b(?:\d{1,3}\.){3}\d{1,3}\b/g
// Full form or a single "::" compression, on word boundaries. A trailing
// "." is refused only before a digit so that the head of an IPv4-mapped
// address ("::ffff:10.0.0.1") is never taken alone.
const IPV6_PATTERN = new RegExp(
    '(?<!\\w)(?:'
        + '(?:[0-9A-Fa-f]{1,4}(?::[0-9A-Fa-f]{1,4}){0,6})?::(?:[0-9A-Fa-f]{1,4}(?::[0-9A-Fa-f]{1,4}){0,6})?'
        + '|[0-9A-Fa-f]{1,4}(?::[0-9A-Fa-f]{1,4}){1,7}'
    + ')(?!\\w|\\.\\d|:\\d{1,3}\\.\\d)',
    'g'
)
const MAC_SHAPE = /^[0-9A-Fa-f]{2}([:-])[0-9A-Fa-f]{2}(?:\1[0-9A-Fa-f]{2}){4}$/

function findSpans(text: string, pattern: RegExp, accept: (match: string) => boolean = () => true): MatchSpan[] {
    const spans: MatchSpan[] = []

    for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0

        if (!accept(match[0])) {
            continue
        }

        spans.push({ start, end: start + match[0].length, text: match[0] })
    }

    return spans
}

export function isMacShaped(text: string): boolean {
    return MAC_SHAPE.test(text)
}

export function findMacAddresses(text: string): MatchSpan[] {
    return findSpans(text, MAC_PATTERN)
}

export function findIpv4Addresses(text: string): MatchSpan[] {
    return findSpans(text, IPV4_PATTERN)
}

export function findIpv6Addresses(text: string): MatchSpan[] {
    return findSpans(text, IPV6_PATTERN, match => !isMacShaped(match))
}

/**
 * Spans must be sorted and must not overlap
 */
export function replaceSpans(text: string, spans: MatchSpan[], replace: SpanReplacer): string {
    if (spans.length === 0) {
        return text
    }

    let result = ''
    let cursor = 0

    for (const span of spans) {
        result += text.substring(cursor, span.start) + replace(span.text)
        cursor = span.end
    }

    return result + text.substring(cursor)
}

export function scanMacAddresses(text: string, replace: SpanReplacer): string {
    return replaceSpans(text, findMacAddresses(text), replace)
}

export function scanIpv4Addresses(text: string, replace: SpanReplacer): string {
    return replaceSpans(text, findIpv4Addresses(text), replace)
}

export function scanIpv6Addresses(text: string, replace: SpanReplacer): string {
    return replaceSpans(text, findIpv6Addresses(text), replace)
}

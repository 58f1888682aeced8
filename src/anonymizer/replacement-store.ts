export type ReplacementKind = 'mac' | 'ipv4' | 'ipv6' | 'ssid'

export interface ReplacementEntry {
    kind: ReplacementKind
    original: string
    replacement: string
}

/**
 * Original -> replacement memory of one anonymization run.
 * First seen value wins and nothing is ever evicted.
 */
export class ReplacementStore {
    protected replacements = new Map<ReplacementKind, Map<string, string>>()

    protected getKindReplacements(kind: ReplacementKind) {
        let kindReplacements = this.replacements.get(kind)

        if (!kindReplacements) {
            kindReplacements = new Map
            this.replacements.set(kind, kindReplacements)
        }

        return kindReplacements
    }

    public get(kind: ReplacementKind, original: string): string | undefined {
        return this.replacements.get(kind)?.get(original)
    }

    public has(kind: ReplacementKind, original: string): boolean {
        return this.get(kind, original) !== undefined
    }

    public getOrCreate(kind: ReplacementKind, original: string, create: () => string): string {
        const kindReplacements = this.getKindReplacements(kind)
        const existing = kindReplacements.get(original)

        if (existing !== undefined) {
            return existing
        }

        const replacement = create()
        kindReplacements.set(original, replacement)

        return replacement
    }

    public get size() {
        let size = 0
        this.replacements.forEach(kindReplacements => size += kindReplacements.size)
        return size
    }

    public entries(): ReplacementEntry[] {
        const entries: ReplacementEntry[] = []

        this.replacements.forEach((kindReplacements, kind) => {
            kindReplacements.forEach((replacement, original) => {
                entries.push({ kind, original, replacement })
            })
        })

        return entries
    }
}

import { random } from 'lodash'

export interface RandomSource {
    /** Integer between min and max, both included */
    integer(min: number, max: number): number
    pick<T>(items: readonly T[]): T
}

export function createRandomSource(): RandomSource {
    return {
        integer(min, max) {
            return random(min, max, false)
        },
        pick(items) {
            if (items.length === 0) {
                throw new Error('Unable to pick from an empty list')
            }
            return items[random(0, items.length - 1, false)]
        }
    }
}

/**
 * Replays the given values in a loop, folded into the requested range.
 * Picking uses the value as an index.
 */
export function createSequenceRandomSource(values: number[]): RandomSource {
    if (values.length === 0) {
        throw new Error('A sequence random source needs at least one value')
    }

    let cursor = 0

    const next = () => {
        const value = values[cursor % values.length]
        cursor++
        return value
    }

    return {
        integer(min, max) {
            const span = max - min + 1
            return min + (((next() - min) % span) + span) % span
        },
        pick(items) {
            if (items.length === 0) {
                throw new Error('Unable to pick from an empty list')
            }
            return items[((next() % items.length) + items.length) % items.length]
        }
    }
}

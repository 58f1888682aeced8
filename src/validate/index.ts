import Ajv, { type SchemaObject } from 'ajv'
import { cloneDeep } from 'lodash'
export type { SchemaObject }

export interface ValidateConfig {
    schema: SchemaObject
    removeAdditional?: boolean
    contextErrorMsg?: string
}

export class ValidationError extends Error {
    name = 'ValidationError'
    readonly path?: string

    constructor(message: string, path?: string) {
        super(message)
        this.path = path
    }
}

export function validate<Data>(data: unknown, config: ValidateConfig): Data {
    const ajv = new Ajv({
        coerceTypes: true,
        removeAdditional: !!config.removeAdditional,
        useDefaults: true,
        strict: true
    })
    const wrapData = {data: cloneDeep(data)} // Don't modify caller data !

    const wrapSchema = {
        type: 'object',
        properties: {
            data: config.schema
        }
    }

    if (!ajv.validate<{data: Data}>(wrapSchema, wrapData)) {
        const firstError = ajv.errors?.[0]
        const path = firstError?.instancePath
            ? firstError.instancePath.replace(/^\/data\/?/, '').replace(/\//g, '.')
            : ''
        const message = (config.contextErrorMsg ? config.contextErrorMsg + ' ' : '')
            + (path ? path + ' ' : '')
            + (firstError?.message || 'is invalid')

        throw new ValidationError(message, path || undefined)
    }

    return wrapData.data
}

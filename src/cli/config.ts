import { loadConfig } from '../config'
import { DEFAULT_SSID_PLACEHOLDERS } from '../anonymizer'
import { DEFAULT_INDENTATION, DEFAULT_OUTPUT_SUFFIX } from '../anonymize-file'
import { levels, type LogLevel } from '../logger'
import type { SchemaObject } from '../validate'

export interface AnonymizerConfig {
    log: {
        level: LogLevel
    }
    indentation: number
    outputSuffix: string
    ssidPlaceholders: string[]
}

export const configSchema: SchemaObject = {
    type: 'object',
    properties: {
        log: {
            type: 'object',
            properties: {
                level: { type: 'string', enum: [...levels], default: 'info' }
            },
            required: ['level'],
            additionalProperties: false,
            default: {}
        },
        indentation: { type: 'integer', minimum: 0, maximum: 10, default: DEFAULT_INDENTATION },
        outputSuffix: { type: 'string', minLength: 1, default: DEFAULT_OUTPUT_SUFFIX },
        ssidPlaceholders: {
            type: 'array',
            items: { type: 'string', minLength: 1 },
            minItems: 1,
            default: [...DEFAULT_SSID_PLACEHOLDERS]
        }
    },
    required: ['log', 'indentation', 'outputSuffix', 'ssidPlaceholders']
}

export function loadAnonymizerConfig({filename, env}: {filename?: string, env?: NodeJS.ProcessEnv} = {}) {
    return loadConfig<AnonymizerConfig>({
        schema: configSchema,
        filename,
        envFilename: 'ANONYMIZER_CONFIG',
        envPrefix: 'ANONYMIZER',
        env
    })
}

import { existsSync } from 'fs'
import { readFile } from 'fs/promises'
import { mapKeys, pickBy, each, set } from 'lodash'
import { extname } from 'path'
import { parse as parseYaml } from 'yaml'
import { validate, type SchemaObject } from '../validate'

export interface ConfigOpts {
    schema: SchemaObject
    /** Read when it exists, ignored otherwise */
    defaultFilename?: string
    /** Must exist */
    filename?: string
    /** Name of the env variable that can provide the filename */
    envFilename?: string
    envPrefix?: string
    envDelimiter?: string
    env?: NodeJS.ProcessEnv
}

export class ConfigError extends Error {
    name = 'ConfigError'
}

/**
 * Maps an env path (case-insensitive, "_" as delimiter) to the schema real path.
 * Underscores inside property names are tried before splitting.
 */
function findGoodPath(envPathNodes: string[], schema: SchemaObject): string | undefined {
    if (envPathNodes.length === 0) {
        return ''
    }

    if (schema.type !== 'object' || !schema.properties) {
        return
    }

    const properties: Record<string, SchemaObject> = schema.properties

    for (let length = envPathNodes.length; length > 0; length--) {
        const candidate = envPathNodes.slice(0, length).join('_').toLowerCase()
        const targetKey = Object.keys(properties).find(key => key.toLowerCase() === candidate.replace(/_/g, '')
            || key.toLowerCase() === candidate)

        if (!targetKey) {
            continue
        }

        const subPath = findGoodPath(envPathNodes.slice(length), properties[targetKey])

        if (subPath !== undefined) {
            return subPath ? targetKey + '.' + subPath : targetKey
        }
    }
}

function extractEnvConfigPathsValues({delimiter, prefix, schema, env}: {delimiter: string, prefix?: string, schema: SchemaObject, env: NodeJS.ProcessEnv}): Record<string, string> {
    const fullPrefix = prefix ? prefix.toLowerCase() + (prefix.endsWith(delimiter) ? '' : delimiter) : null
    const prefixedEnvs: Record<string, string | undefined> = fullPrefix
        ? mapKeys(pickBy(env, (_, key) => key.toLowerCase().startsWith(fullPrefix)), (_, key) => key.substring(fullPrefix.length))
        : env
    const paths: Record<string, string> = {}

    for (const [key, value] of Object.entries(prefixedEnvs)) {
        const path = findGoodPath(key.split(delimiter), schema)

        if (path && value !== undefined) {
            paths[path] = value
        }
    }

    return paths
}

function errorMessage(e: unknown) {
    return e instanceof Error ? e.message : String(e)
}

async function parseFile(filename: string): Promise<unknown> {
    const extension = extname(filename)

    if (!['.yml', '.yaml', '.json'].includes(extension)) {
        throw new ConfigError('Unhandled config file type ' + filename)
    }

    let content: string
    try {
        content = await readFile(filename, 'utf8')
    } catch (e) {
        throw new ConfigError('Unable to read ' + filename + ' : ' + errorMessage(e), { cause: e })
    }

    try {
        return extension === '.json' ? JSON.parse(content) : parseYaml(content)
    } catch (e) {
        throw new ConfigError('Unable to parse ' + filename + ' : ' + errorMessage(e), { cause: e })
    }
}

export async function loadConfig<Config extends object>(opts: ConfigOpts): Promise<Config> {
    const env = opts.env || process.env
    let configInProgress: object = {}
    let filename = opts.filename

    if (!filename && opts.envFilename && env[opts.envFilename]) {
        filename = env[opts.envFilename]
    }

    if (filename && !existsSync(filename)) {
        throw new ConfigError('Unable to find ' + filename)
    }

    filename = filename || (opts.defaultFilename && existsSync(opts.defaultFilename) ? opts.defaultFilename : undefined)

    if (filename) {
        const fileConfig = await parseFile(filename)

        if (fileConfig !== null && fileConfig !== undefined) {
            if (typeof fileConfig !== 'object' || Array.isArray(fileConfig)) {
                throw new ConfigError('Config file ' + filename + ' must contain an object')
            }
            configInProgress = fileConfig
        }
    }

    const userEnvProvidedConfig = extractEnvConfigPathsValues({
        delimiter: opts.envDelimiter || '_',
        prefix: opts.envPrefix,
        schema: opts.schema,
        env
    })

    each(userEnvProvidedConfig, (value, key) => {
        set(configInProgress, key, value)
    })

    return validate<Config>(configInProgress, {
        schema: {...opts.schema, additionalProperties: false},
        removeAdditional: true,
        contextErrorMsg: 'Configuration'
    })
}

import { deepEqual, ok, rejects, strictEqual } from 'assert'
import { mkdir, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { v4 as uuid } from 'uuid'
import { ConfigError, loadConfig } from '.'
import { ValidationError, type SchemaObject } from '../validate'

interface Config {
    log: { level: string }
    outputSuffix: string
    indentation: number
}

const schema: SchemaObject = {
    type: 'object',
    properties: {
        log: {
            type: 'object',
            properties: { level: { type: 'string', enum: ['info', 'debug'], default: 'info' } },
            required: ['level'],
            additionalProperties: false,
            default: {}
        },
        outputSuffix: { type: 'string', default: '.anonymized' },
        indentation: { type: 'integer', default: 4 }
    },
    required: ['log', 'outputSuffix', 'indentation']
}

describe('Config', () => {
    let dir: string

    beforeEach(async () => {
        dir = join(tmpdir(), 'config-test-' + uuid())
        await mkdir(dir, { recursive: true })
    })

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true })
    })

    it('applies defaults', async () => {
        deepEqual(
            await loadConfig<Config>({ schema, env: {} }),
            { log: { level: 'info' }, outputSuffix: '.anonymized', indentation: 4 }
        )
    })

    it('reads yaml files and env overrides', async () => {
        const filename = join(dir, 'config.yml')
        await writeFile(filename, 'outputSuffix: .anon\nindentation: 2\nunknown: true\n')

        deepEqual(
            await loadConfig<Config>({
                schema,
                envFilename: 'APP_CONFIG',
                envPrefix: 'app',
                env: { APP_CONFIG: filename, APP_LOG_LEVEL: 'debug', APP_INDENTATION: '8', OTHER_LOG_LEVEL: 'info' }
            }),
            { log: { level: 'debug' }, outputSuffix: '.anon', indentation: 8 }
        )
    })

    it('reads json files and maps underscored env names', async () => {
        const filename = join(dir, 'config.json')
        await writeFile(filename, '{"indentation": 0}')

        deepEqual(
            await loadConfig<Config>({ schema, filename, envPrefix: 'APP', env: { APP_OUTPUT_SUFFIX: '.safe' } }),
            { log: { level: 'info' }, outputSuffix: '.safe', indentation: 0 }
        )
    })

    it('ignores a missing default file', async () => {
        strictEqual(
            (await loadConfig<Config>({ schema, defaultFilename: join(dir, 'none.yml'), env: {} })).indentation,
            4
        )
    })

    it('fails on a missing explicit file', async () => {
        const filename = join(dir, 'none.yml')

        await rejects(loadConfig<Config>({ schema, filename, env: {} }), (error: unknown) => {
            ok(error instanceof ConfigError)
            strictEqual(error.message, 'Unable to find ' + filename)
            return true
        })
    })

    it('fails on unparsable files', async () => {
        const yamlFilename = join(dir, 'config.yml')
        const jsonFilename = join(dir, 'config.json')
        await writeFile(yamlFilename, 'log: [debug\n')
        await writeFile(jsonFilename, '{"indentation": ')

        for (const filename of [yamlFilename, jsonFilename]) {
            await rejects(loadConfig<Config>({ schema, filename, env: {} }), (error: unknown) => {
                ok(error instanceof ConfigError)
                ok(error.message.startsWith('Unable to parse ' + filename + ' : '), error.message)
                ok(error.cause instanceof Error)
                return true
            })
        }
    })

    it('fails on unreadable files', async () => {
        const filename = join(dir, 'folder.yml')
        await mkdir(filename)

        await rejects(loadConfig<Config>({ schema, filename, env: {} }), (error: unknown) => {
            ok(error instanceof ConfigError)
            ok(error.message.startsWith('Unable to read ' + filename + ' : '), error.message)
            return true
        })
    })

    it('fails on invalid values', async () => {
        await rejects(
            loadConfig<Config>({ schema, envPrefix: 'APP', env: { APP_LOG_LEVEL: 'verbose' } }),
            (error: unknown) => {
                ok(error instanceof ValidationError)
                strictEqual(error.message, 'Configuration log.level must be equal to one of the allowed values')
                return true
            }
        )
    })
})

import { deepEqual, ok, strictEqual } from 'assert'
import { existsSync } from 'fs'
import { mkdir, readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { v4 as uuid } from 'uuid'
import { ExitCodes, main, parseArgs } from '.'
import { configSchema, loadAnonymizerConfig } from './config'
import { DEFAULT_SSID_PLACEHOLDERS } from '../anonymizer'

function parse(...rest: string[]) {
    return parseArgs(['node', 'anonymize-device-state', ...rest])
}

describe('CLI', () => {

    describe('parseArgs', () => {
        it('parses input and output', () => {
            deepEqual(parse('modem.json'), { command: 'anonymize', args: { inputPath: 'modem.json' } })
            deepEqual(parse('modem.json', 'out.json', '--log-level', 'debug', '--config', 'conf.yml'), {
                command: 'anonymize',
                args: { inputPath: 'modem.json', outputPath: 'out.json', logLevel: 'debug', configPath: 'conf.yml' }
            })
        })

        it('shows help', () => {
            deepEqual(parse('--help'), { command: 'help' })
            deepEqual(parse('modem.json', '-h'), { command: 'help' })
        })

        it('reports errors', () => {
            deepEqual(parse(), { error: 'Missing input path' })
            deepEqual(parse('a', 'b', 'c'), { error: 'Too many arguments' })
            deepEqual(parse('a', '--force'), { error: 'Unknown option --force' })
            deepEqual(parse('a', '--config'), { error: '--config requires a path' })
            deepEqual(parse('a', '--log-level', 'loud'), { error: '--log-level must be one of fatal, error, warning, info, debug' })
        })
    })

    describe('config', () => {
        it('has defaults', async () => {
            deepEqual(await loadAnonymizerConfig({ env: {} }), {
                log: { level: 'info' },
                indentation: 4,
                outputSuffix: '.anonymized',
                ssidPlaceholders: [...DEFAULT_SSID_PLACEHOLDERS]
            })
            strictEqual(configSchema.type, 'object')
        })
    })

    describe('main', () => {
        let dir: string

        beforeEach(async () => {
            dir = join(tmpdir(), 'cli-test-' + uuid())
            await mkdir(dir, { recursive: true })
        })

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true })
        })

        it('anonymizes a file', async () => {
            const inputPath = join(dir, 'modem.json')
            const configPath = join(dir, 'config.yml')
            await writeFile(inputPath, '{"ssid": "HomeNet", "version": "1.0.3"}')
            await writeFile(configPath, 'ssidPlaceholders:\n  - Guest\nindentation: 0\nlog:\n  level: error\n')

            strictEqual(await main(['node', 'cli', inputPath, '--config', configPath], {}), 0)
            strictEqual(
                await readFile(join(dir, 'modem.anonymized.json'), 'utf8'),
                '{"ssid":"Guest","version":"1.0.3"}\n'
            )
        })

        it('returns an exit code per failure', async () => {
            const brokenPath = join(dir, 'broken.json')
            await writeFile(brokenPath, 'not json')

            strictEqual(await main(['node', 'cli', join(dir, 'missing.json'), '--log-level', 'fatal'], {}), ExitCodes.inputNotFound)
            strictEqual(await main(['node', 'cli', brokenPath, '--log-level', 'fatal'], {}), ExitCodes.malformedInput)
            strictEqual(await main(['node', 'cli', brokenPath, '--log-level', 'fatal'], { ANONYMIZER_INDENTATION: 'wide' }), ExitCodes.invalidConfig)
            ok(!existsSync(join(dir, 'broken.anonymized.json')))
        })

        it('reports a broken config file as invalid config', async () => {
            const inputPath = join(dir, 'modem.json')
            const configPath = join(dir, 'config.yml')
            await writeFile(inputPath, '{}')
            await writeFile(configPath, 'indentation: [2\n')

            strictEqual(await main(['node', 'cli', inputPath, '--config', configPath, '--log-level', 'fatal'], {}), ExitCodes.invalidConfig)
            ok(!existsSync(join(dir, 'modem.anonymized.json')))
        })
    })
})

import { deepEqual, ok, rejects, strictEqual } from 'assert'
import { existsSync } from 'fs'
import { mkdir, readdir, readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { v4 as uuid } from 'uuid'
import {
    anonymizeFile,
    defaultOutputPath,
    InputNotFoundError,
    MalformedInputError,
    OutputWriteFailedError,
    UnexpectedFailureError
} from '.'
import { Anonymizer, createSequenceRandomSource } from '../anonymizer'
import { createCallbackHandler, createLogger, type Log } from '../logger'

describe('Anonymize file', () => {
    let dir: string

    beforeEach(async () => {
        dir = join(tmpdir(), 'anonymize-file-test-' + uuid())
        await mkdir(dir, { recursive: true })
    })

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true })
    })

    it('computes the default output path', () => {
        strictEqual(defaultOutputPath('/data/modem.json'), '/data/modem.anonymized.json')
        strictEqual(defaultOutputPath('dump'), 'dump.anonymized')
        strictEqual(defaultOutputPath('/data/modem.json', '.anon'), '/data/modem.anon.json')
    })

    it('writes a pretty printed anonymized copy', async () => {
        const inputPath = join(dir, 'modem.json')
        await writeFile(inputPath, JSON.stringify({
            version: '1.0.3',
            device: { serial_number: 'ABC123', wan_ip: '8.8.8.8' },
            list: [1, 'x']
        }))

        const outputPath = await anonymizeFile({
            inputPath,
            anonymizer: new Anonymizer({ serialNumber: 'TS000000000000', random: createSequenceRandomSource([3, 200, 42]) })
        })

        strictEqual(outputPath, join(dir, 'modem.anonymized.json'))
        strictEqual(
            await readFile(outputPath, 'utf8'),
            [
                '{',
                '    "version": "1.0.3",',
                '    "device": {',
                '        "serial_number": "TS000000000000",',
                '        "wan_ip": "10.3.200.42"',
                '    },',
                '    "list": [',
                '        1,',
                '        "x"',
                '    ]',
                '}',
                ''
            ].join('\n')
        )
    })

    it('honors the output path and indentation', async () => {
        const inputPath = join(dir, 'modem.json')
        const outputPath = join(dir, 'out.json')
        await writeFile(inputPath, '{"a": [true]}')

        strictEqual(await anonymizeFile({ inputPath, outputPath, indentation: 2 }), outputPath)
        strictEqual(await readFile(outputPath, 'utf8'), '{\n  "a": [\n    true\n  ]\n}\n')
    })

    it('shares replacements between files of a same run', async () => {
        const anonymizer = new Anonymizer
        const firstPath = join(dir, 'first.json')
        const secondPath = join(dir, 'second.json')
        await writeFile(firstPath, '{"mac": "00:11:22:33:44:55"}')
        await writeFile(secondPath, '[{"lan_mac": "00:11:22:33:44:55"}]')

        const first = JSON.parse(await readFile(await anonymizeFile({ inputPath: firstPath, anonymizer }), 'utf8'))
        const second = JSON.parse(await readFile(await anonymizeFile({ inputPath: secondPath, anonymizer }), 'utf8'))

        strictEqual(second[0].lan_mac, first.mac)
    })

    it('fails when the input is missing', async () => {
        const inputPath = join(dir, 'missing.json')

        await rejects(anonymizeFile({ inputPath }), (error: unknown) => {
            ok(error instanceof InputNotFoundError)
            strictEqual(error.code, 'InputNotFound')
            strictEqual(error.path, inputPath)
            return true
        })
        deepEqual(await readdir(dir), [])
    })

    it('fails on malformed input without writing', async () => {
        const inputPath = join(dir, 'broken.json')
        await writeFile(inputPath, '{"a": ')

        await rejects(anonymizeFile({ inputPath }), (error: unknown) => {
            ok(error instanceof MalformedInputError)
            strictEqual(error.code, 'MalformedInput')
            return true
        })
        deepEqual(await readdir(dir), ['broken.json'])
    })

    it('fails when the output can not be written and leaves nothing behind', async () => {
        const inputPath = join(dir, 'modem.json')
        const outputPath = join(dir, 'taken')
        await writeFile(inputPath, '{"ssid": "HomeNet"}')
        await mkdir(outputPath)

        await rejects(anonymizeFile({ inputPath, outputPath }), (error: unknown) => {
            ok(error instanceof OutputWriteFailedError)
            strictEqual(error.code, 'OutputWriteFailed')
            strictEqual(error.path, outputPath)
            return true
        })
        deepEqual((await readdir(dir)).sort(), ['modem.json', 'taken'])
        deepEqual(await readdir(outputPath), [])
    })

    it('fails when the output directory does not exist', async () => {
        const inputPath = join(dir, 'modem.json')
        const outputPath = join(dir, 'nope', 'out.json')
        await writeFile(inputPath, '{}')

        await rejects(anonymizeFile({ inputPath, outputPath }), OutputWriteFailedError)
        strictEqual(existsSync(outputPath), false)
    })

    it('wraps other failures with their cause', async () => {
        const inputPath = join(dir, 'folder.json')
        await mkdir(inputPath)

        await rejects(anonymizeFile({ inputPath }), (error: unknown) => {
            ok(error instanceof UnexpectedFailureError)
            strictEqual(error.code, 'UnexpectedFailure')
            strictEqual(error.path, inputPath)
            ok(error.cause instanceof Error)
            strictEqual('code' in error.cause && error.cause.code, 'EISDIR')
            return true
        })
        deepEqual(await readdir(dir), ['folder.json'])
    })

    it('logs its steps', async () => {
        const inputPath = join(dir, 'modem.json')
        await writeFile(inputPath, '{"ssid": "HomeNet", "version": "2"}')
        const logs: Log[] = []
        const logger = createLogger({ handlers: [createCallbackHandler({ cb: async (_, log) => { logs.push(log) } })] })

        await anonymizeFile({ inputPath, logger })

        deepEqual(logs.map(log => [log.level, log.message]), [
            ['debug', 'Reading document'],
            ['debug', 'Document anonymized']
        ])
        strictEqual(logs[0].inputPath, inputPath)
        deepEqual(logs[1].changes, { keep: 0, serialNumber: 0, password: 0, ssid: 1, bssid: 0, content: 0 })
        strictEqual(logs[1].replacements, 1)
    })
})

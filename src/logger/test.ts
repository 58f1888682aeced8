import { deepEqual, strictEqual } from 'assert'
import {
    createCallbackHandler,
    createJsonFormatter,
    createLogfmtFormatter,
    createLogger,
    createMemoryHandler,
    createTextFormatter,
    shouldBeLogged,
    type Log
} from '.'

function collectingLogger(maxLevel: Log['level'] = 'debug') {
    const logs: Log[] = []
    const logger = createLogger({
        handlers: [createCallbackHandler({ maxLevel, cb: async (_, log) => { logs.push(log) } })]
    })
    return { logs, logger }
}

describe('Logger', () => {

    it('filters by level', async () => {
        const { logs, logger } = collectingLogger('warning')

        await logger.info('Not shown')
        await logger.error('Shown', { count: 1 })

        strictEqual(logs.length, 1)
        strictEqual(logs[0].level, 'error')
        strictEqual(logs[0].message, 'Shown')
        strictEqual(logs[0].count, 1)
        strictEqual(shouldBeLogged('debug', 'info'), false)
        strictEqual(shouldBeLogged('fatal', 'info'), true)
        strictEqual(shouldBeLogged('fatal', 'info', 'error'), false)
    })

    it('passes metadata to children', async () => {
        const { logs, logger } = collectingLogger()

        await logger.child('driver', { inputPath: 'modem.json' }).debug('Reading')

        strictEqual(logs[0].logger, 'driver')
        strictEqual(logs[0].inputPath, 'modem.json')
    })

    it('protects reserved keys', async () => {
        const { logs, logger } = collectingLogger()

        await logger.info('Real message', { message: 'metadata message' })

        strictEqual(logs[0].message, 'Real message')
        strictEqual(logs[0]._message, 'metadata message')
    })

    it('drops logs from processors', async () => {
        const memoryHandler = createMemoryHandler()
        const logger = createLogger({
            handlers: [memoryHandler],
            processors: [log => log.message.startsWith('secret') ? null : log]
        })

        await logger.info('secret stuff')
        await logger.info('public stuff')

        strictEqual(memoryHandler.getWrittenLogs(true).length, 1)
        strictEqual(memoryHandler.getWrittenLogs().length, 0)
    })

    it('formats logs', () => {
        const log: Log = {
            timestamp: new Date('2024-01-01T00:00:00.000Z'),
            level: 'info',
            message: 'Hello world',
            count: 3
        }

        strictEqual(
            createLogfmtFormatter()(log),
            'count=3 level=info message="Hello world" timestamp=2024-01-01T00:00:00.000Z'
        )
        strictEqual(
            createJsonFormatter()(log),
            '{"count":3,"level":"info","message":"Hello world","timestamp":"2024-01-01T00:00:00.000Z"}'
        )
        strictEqual(
            createTextFormatter()({
                timestamp: new Date(0),
                level: 'error',
                message: 'Unable to find input x',
                path: '/a b',
                code: 'InputNotFound'
            }),
            '[error] Unable to find input x code=InputNotFound path="/a b"'
        )
        strictEqual(
            createTextFormatter()({ timestamp: new Date(0), level: 'error', message: 'Failed', error: new Error('boom') }),
            '[error] Failed error=boom'
        )
    })

    it('serializes errors in json', () => {
        const formatted = createJsonFormatter()({ timestamp: new Date(0), level: 'error', message: 'Failed', error: new Error('boom') })

        deepEqual(JSON.parse(formatted).error.message, 'boom')
    })
})

import { cloneDeep, mapKeys, chain, omit } from 'lodash'
import stringify from 'safe-stable-stringify'
import { EOL } from 'os'
import { flatten as flattenObject } from 'flat'

export type LogLevel = 'fatal' | 'error' | 'warning' | 'info' | 'debug'
export const levels: readonly LogLevel[] = ['fatal', 'error', 'warning', 'info', 'debug']

export type LogMetadata = Record<string, unknown>

export function shouldBeLogged(logLevel: LogLevel, maxLogLevel: LogLevel, minLogLevel?: LogLevel) {
    return levels.indexOf(logLevel) <= levels.indexOf(maxLogLevel)
        && (minLogLevel ? levels.indexOf(logLevel) >= levels.indexOf(minLogLevel) : true)
}

export function createLogger(loggerOpts: LoggerOpts = {}) {
    return new Logger(loggerOpts)
}

const RESERVED_KEYS = ['level', 'message', 'timestamp', 'logger']

function ensureNotKeys(object: LogMetadata, keys: string[]): LogMetadata {
    return mapKeys(object, (_, key) => {
        if (!keys.includes(key)) {
            return key
        }
        let newKey = key

        while (Object.prototype.hasOwnProperty.call(object, newKey)) {
            newKey = '_' + newKey
        }
        return newKey
    })
}

export interface Handler {
    handle(log: Log, logger: Logger): Promise<void>
}

/** Returning null drops the log */
export type Processor = (log: Log, logger: Logger) => Log | null

export interface LoggerOpts {
    id?: string
    metadata?: LogMetadata
    processors?: Processor[]
    handlers?: Handler[]
    errorHandler?: (e: Error) => Promise<void>
}

export interface Log {
    level: LogLevel
    timestamp: Date
    logger?: string
    message: string
    [k: string]: unknown
}

export class Logger {
    protected processors: Processor[]
    protected handlers: Handler[]
    protected metadata: LogMetadata
    protected errorHandler: (e: Error) => Promise<void>
    protected id?: string

    constructor(opts: LoggerOpts = {}) {
        this.id = opts.id
        this.metadata = opts.metadata || {}
        this.processors = opts.processors || []
        this.handlers = opts.handlers || [new ConsoleHandler]
        this.errorHandler = opts.errorHandler || (async (e) => { throw e })
    }

    public async log(level: LogLevel, message: string, metadata?: LogMetadata): Promise<void> {
        try {
            let log: Log | null = {
                timestamp: new Date,
                level,
                ...this.id !== undefined && {logger: this.id},
                message,
                ...ensureNotKeys(
                    cloneDeep({...this.metadata, ...metadata}),
                    RESERVED_KEYS
                )
            }

            for (const processor of this.processors) {
                log = processor(log, this)

                if (!log) {
                    return
                }
            }

            const processedLog = log

            await Promise.all(this.handlers.map(handler => handler.handle(processedLog, this)))
        } catch (e) {
            await this.errorHandler(e instanceof Error ? e : new Error(String(e)))
        }
    }

    public child(id?: string, metadata?: LogMetadata): Logger {
        return new Logger({
            id: id ?? this.id,
            metadata: cloneDeep({...this.metadata, ...(metadata || {})}),
            processors: [...this.processors],
            handlers: [...this.handlers],
            errorHandler: this.errorHandler
        })
    }

    public async fatal(message: string, metadata?: LogMetadata) {
        return this.log('fatal', message, metadata)
    }
    public async error(message: string, metadata?: LogMetadata) {
        return this.log('error', message, metadata)
    }
    public async warning(message: string, metadata?: LogMetadata) {
        return this.log('warning', message, metadata)
    }
    public async info(message: string, metadata?: LogMetadata) {
        return this.log('info', message, metadata)
    }
    public async debug(message: string, metadata?: LogMetadata) {
        return this.log('debug', message, metadata)
    }
}

export type Formatter<T = unknown> = (log: Log) => T

interface CreateJsonFormatterOpts {
    indentation?: number
}

function jsonReplacer(_: string, value: unknown) {
    if (value instanceof Error) {
        return {
            ...value,
            name: value.name,
            message: value.message,
            stack: value.stack
        }
    }

    return value
}

export function createJsonFormatter(opts: CreateJsonFormatterOpts = {}): Formatter<string> {
    return (log: Log) => {
        return stringify(log, jsonReplacer, opts.indentation) ?? ''
    }
}

function toLogfmt(values: object): string {
    return chain(flattenObject<object, Record<string, unknown>>(values, {delimiter: '.'}))
        .omitBy(v => v === undefined)
        .mapKeys((_, k: string) => k.replace(/ /g, '_'))
        .mapValues(v => {
            if (typeof v === 'string' && !v.match(/\s/)) {
                return v
            }

            return JSON.stringify(v)
        })
        .omitBy(v => v === '' || v === undefined)
        .toPairs()
        .map(kv => kv.join('='))
        .join(' ')
        .value()
}

export function createLogfmtFormatter(): Formatter<string> {
    const toJson = createJsonFormatter()

    return (log: Log) => toLogfmt(JSON.parse(toJson(log)))
}

/**
 * "[level] message key=value ...", errors reduced to their message
 */
export function createTextFormatter(): Formatter<string> {
    return (log: Log) => {
        const details: LogMetadata = {}

        for (const [key, value] of Object.entries(omit(log, ['level', 'message', 'timestamp']))) {
            details[key] = value instanceof Error ? value.message : value
        }

        const detailsText = toLogfmt(JSON.parse(stringify(details, jsonReplacer) ?? '{}'))

        return '[' + log.level + '] ' + log.message + (detailsText ? ' ' + detailsText : '')
    }
}

export interface BaseHandlerOpts {
    maxLevel?: LogLevel
    minLevel?: LogLevel
    processors?: Processor[]
    formatter?: Formatter
}

export abstract class BaseHandler implements Handler {
    protected maxLevel: LogLevel
    protected minLevel: LogLevel
    protected formatter: Formatter
    protected processors: Processor[]

    constructor(opts: BaseHandlerOpts = {}) {
        this.maxLevel = opts.maxLevel || 'debug'
        this.minLevel = opts.minLevel || 'fatal'
        this.processors = opts.processors || []
        this.formatter = opts.formatter || createJsonFormatter()
    }

    protected willHandle(log: Log) {
        return shouldBeLogged(log.level, this.maxLevel, this.minLevel)
    }

    public async handle(log: Log, logger: Logger) {
        if (!this.willHandle(log)) {
            return
        }

        let processedLog: Log | null = log

        for (const processor of this.processors) {
            processedLog = processor(processedLog, logger)

            if (!processedLog) {
                return
            }
        }

        return this.write(this.formatter(processedLog), processedLog, logger)
    }

    protected abstract write(formatted: unknown, log: Log, logger: Logger): Promise<void>
}

export interface StreamHandlerOpts extends BaseHandlerOpts {
    stream: NodeJS.WritableStream
}

export class StreamHandler extends BaseHandler {
    protected stream: NodeJS.WritableStream

    constructor(opts: StreamHandlerOpts) {
        super(opts)
        this.stream = opts.stream
    }

    protected async write(formatted: unknown) {
        this.stream.write(String(formatted) + EOL)
    }
}

export function createStreamHandler(opts: StreamHandlerOpts) {
    return new StreamHandler(opts)
}

export class ConsoleHandler extends BaseHandler {
    protected async write(formatted: unknown, log: Log) {
        if (['debug', 'info'].includes(log.level)) {
            process.stdout.write(String(formatted) + EOL)
        } else {
            process.stderr.write(String(formatted) + EOL)
        }
    }
}

export class MemoryHandler extends BaseHandler {
    protected writtenLogs: unknown[] = []

    constructor(opts: BaseHandlerOpts = {}) {
        super({formatter: log => log, ...opts})
    }

    protected async write(formatted: unknown) {
        this.writtenLogs.push(formatted)
    }

    public getWrittenLogs(consume: boolean = false) {
        const writtenLogs = this.writtenLogs

        if (consume) {
            this.clearWrittenLogs()
        }

        return writtenLogs
    }

    public clearWrittenLogs() {
        this.writtenLogs = []
    }
}

export function createMemoryHandler(opts: BaseHandlerOpts = {}) {
    return new MemoryHandler(opts)
}

export interface CallbackHandlerOpts extends BaseHandlerOpts {
    cb: (formatted: unknown, log: Log, logger: Logger) => Promise<void>
}

export class CallbackHandler extends BaseHandler {
    protected cb: CallbackHandlerOpts['cb']

    constructor(opts: CallbackHandlerOpts) {
        super(opts)
        this.cb = opts.cb
    }

    protected async write(formatted: unknown, log: Log, logger: Logger) {
        return this.cb(formatted, log, logger)
    }
}

export function createCallbackHandler(opts: CallbackHandlerOpts) {
    return new CallbackHandler(opts)
}

#!/usr/bin/env node
import { Anonymizer } from '../anonymizer'
import { anonymizeFile, AnonymizeFileError } from '../anonymize-file'
import { ConfigError } from '../config'
import { createLogger, createStreamHandler, createTextFormatter, levels, type Logger, type LogLevel } from '../logger'
import { ValidationError } from '../validate'
import { loadAnonymizerConfig, type AnonymizerConfig } from './config'

export enum ExitCodes {
    unexpected = 1,
    invalidArguments = 2,
    invalidConfig = 3,
    inputNotFound = 4,
    malformedInput = 5,
    outputWriteFailed = 6
}

export interface CliArgs {
    inputPath: string
    outputPath?: string
    configPath?: string
    logLevel?: LogLevel
}

export type ParseResult = { command: 'anonymize', args: CliArgs } | { command: 'help' } | { error: string }

export const HELP = `
anonymize-device-state <input.json> [output.json] [options]

Anonymize a JSON document captured from a network device (serial numbers,
MAC/IPv4/IPv6 addresses, Wi-Fi names, passwords). The output defaults to
the input path with ".anonymized" before the extension.

Options:
  --config <path>      Configuration file (JSON or YAML, env: ANONYMIZER_CONFIG)
  --log-level <level>  One of ${levels.join(', ')} (env: ANONYMIZER_LOG_LEVEL)
  -h, --help           Show this help
`.trim()

function isLogLevel(value: string): value is LogLevel {
    return levels.some(level => level === value)
}

/**
 * Takes the raw process.argv
 */
export function parseArgs(argv: string[]): ParseResult {
    const args = argv.slice(2)
    const positionals: string[] = []
    let configPath: string | undefined
    let logLevel: LogLevel | undefined

    for (let i = 0; i < args.length; i++) {
        const arg = args[i]

        switch (arg) {
            case '-h':
            case '--help':
                return { command: 'help' }
            case '--config': {
                const value = args[++i]
                if (!value) {
                    return { error: '--config requires a path' }
                }
                configPath = value
                break
            }
            case '--log-level': {
                const value = args[++i]
                if (!value || !isLogLevel(value)) {
                    return { error: '--log-level must be one of ' + levels.join(', ') }
                }
                logLevel = value
                break
            }
            default:
                if (arg.startsWith('-') && arg !== '-') {
                    return { error: 'Unknown option ' + arg }
                }
                positionals.push(arg)
        }
    }

    if (positionals.length === 0) {
        return { error: 'Missing input path' }
    }

    if (positionals.length > 2) {
        return { error: 'Too many arguments' }
    }

    return {
        command: 'anonymize',
        args: {
            inputPath: positionals[0],
            ...positionals[1] !== undefined && { outputPath: positionals[1] },
            ...configPath !== undefined && { configPath },
            ...logLevel !== undefined && { logLevel }
        }
    }
}

function exitCodeOf(error: AnonymizeFileError): ExitCodes {
    switch (error.code) {
        case 'InputNotFound':
            return ExitCodes.inputNotFound
        case 'MalformedInput':
            return ExitCodes.malformedInput
        case 'OutputWriteFailed':
            return ExitCodes.outputWriteFailed
        case 'UnexpectedFailure':
            return ExitCodes.unexpected
    }
}

// stdout stays free for the caller
function createCliLogger(level: LogLevel): Logger {
    return createLogger({
        handlers: [createStreamHandler({ stream: process.stderr, maxLevel: level, formatter: createTextFormatter() })]
    })
}

/**
 * Resolves to the process exit code
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
    const parsed = parseArgs(argv)

    if ('error' in parsed) {
        process.stderr.write(parsed.error + '\n\n' + HELP + '\n')
        return ExitCodes.invalidArguments
    }

    if (parsed.command === 'help') {
        process.stdout.write(HELP + '\n')
        return 0
    }

    const { args } = parsed
    let logger = createCliLogger(args.logLevel || 'info')

    let config: AnonymizerConfig
    try {
        config = await loadAnonymizerConfig({ filename: args.configPath, env })
    } catch (e) {
        if (e instanceof ConfigError || e instanceof ValidationError) {
            await logger.error(e.message)
            return ExitCodes.invalidConfig
        }
        throw e
    }

    logger = createCliLogger(args.logLevel || config.log.level)

    try {
        const outputPath = await anonymizeFile({
            inputPath: args.inputPath,
            outputPath: args.outputPath,
            outputSuffix: config.outputSuffix,
            indentation: config.indentation,
            anonymizer: new Anonymizer({ ssidPlaceholders: config.ssidPlaceholders }),
            logger
        })
        await logger.info('Anonymized data written to ' + outputPath)
        return 0
    } catch (e) {
        if (e instanceof AnonymizeFileError) {
            await logger.error(e.message, { path: e.path, code: e.code })
            return exitCodeOf(e)
        }
        await logger.error('Unexpected failure', { error: e })
        return ExitCodes.unexpected
    }
}

if (require.main === module) {
    main(process.argv).then(code => {
        process.exitCode = code
    }, (error: unknown) => {
        process.stderr.write(String(error instanceof Error ? error.stack : error) + '\n')
        process.exitCode = ExitCodes.unexpected
    })
}

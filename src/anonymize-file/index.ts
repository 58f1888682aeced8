import { readFile, rename, rm, writeFile } from 'fs/promises'
import { basename, dirname, join, parse as parsePath } from 'path'
import { v4 as uuid } from 'uuid'
import { Anonymizer, type JsonValue } from '../anonymizer'
import type { Logger } from '../logger'

export type AnonymizeFileErrorCode = 'InputNotFound' | 'MalformedInput' | 'OutputWriteFailed' | 'UnexpectedFailure'

export abstract class AnonymizeFileError extends Error {
    abstract readonly code: AnonymizeFileErrorCode
    readonly path: string

    constructor(message: string, path: string, cause?: unknown) {
        super(message, cause !== undefined ? { cause } : undefined)
        this.path = path
    }
}

export class InputNotFoundError extends AnonymizeFileError {
    name = 'InputNotFoundError'
    readonly code = 'InputNotFound'

    constructor(path: string, cause?: unknown) {
        super('Unable to find input ' + path, path, cause)
    }
}

export class MalformedInputError extends AnonymizeFileError {
    name = 'MalformedInputError'
    readonly code = 'MalformedInput'

    constructor(path: string, cause?: unknown) {
        super('Unable to parse JSON from ' + path
            + (cause instanceof Error ? ' : ' + cause.message : ''), path, cause)
    }
}

export class OutputWriteFailedError extends AnonymizeFileError {
    name = 'OutputWriteFailedError'
    readonly code = 'OutputWriteFailed'

    constructor(path: string, cause?: unknown) {
        super('Unable to write output ' + path
            + (cause instanceof Error ? ' : ' + cause.message : ''), path, cause)
    }
}

export class UnexpectedFailureError extends AnonymizeFileError {
    name = 'UnexpectedFailureError'
    readonly code = 'UnexpectedFailure'

    constructor(path: string, cause: unknown) {
        super('Unexpected failure while anonymizing ' + path
            + ' : ' + (cause instanceof Error ? cause.message : String(cause)), path, cause)
    }
}

export interface AnonymizeFileOpts {
    inputPath: string
    /** Defaults to the input path with ".anonymized" before the extension */
    outputPath?: string
    outputSuffix?: string
    /** Reuse a run to keep replacements consistent between files */
    anonymizer?: Anonymizer
    indentation?: number
    logger?: Logger
}

export const DEFAULT_OUTPUT_SUFFIX = '.anonymized'
export const DEFAULT_INDENTATION = 4

export function defaultOutputPath(inputPath: string, suffix: string = DEFAULT_OUTPUT_SUFFIX): string {
    const { dir, name, ext } = parsePath(inputPath)

    return join(dir, name + suffix + ext)
}

function hasErrorCode(error: unknown, ...codes: string[]): boolean {
    return error instanceof Error && 'code' in error && typeof error.code === 'string' && codes.includes(error.code)
}

async function readDocument(path: string): Promise<JsonValue> {
    let content: string

    try {
        content = await readFile(path, 'utf8')
    } catch (e) {
        if (hasErrorCode(e, 'ENOENT', 'ENOTDIR')) {
            throw new InputNotFoundError(path, e)
        }
        throw e
    }

    try {
        return JSON.parse(content)
    } catch (e) {
        throw new MalformedInputError(path, e)
    }
}

/**
 * Write to a sibling temp file then rename, so that the output is
 * complete or absent.
 */
async function writeDocument(path: string, document: JsonValue, indentation: number) {
    const content = JSON.stringify(document, null, indentation) + '\n'
    const tmpPath = join(dirname(path), '.' + basename(path) + '.' + uuid() + '.tmp')

    try {
        await writeFile(tmpPath, content, 'utf8')
        await rename(tmpPath, path)
    } catch (e) {
        await rm(tmpPath, { force: true })
        throw new OutputWriteFailedError(path, e)
    }
}

/**
 * Resolves to the written output path
 */
export async function anonymizeFile(opts: AnonymizeFileOpts): Promise<string> {
    const outputPath = opts.outputPath || defaultOutputPath(opts.inputPath, opts.outputSuffix)
    const anonymizer = opts.anonymizer || new Anonymizer
    const logger = opts.logger?.child(undefined, { inputPath: opts.inputPath, outputPath })

    try {
        await logger?.debug('Reading document')
        const document = await readDocument(opts.inputPath)

        const anonymized = anonymizer.anonymize(document)
        await logger?.debug('Document anonymized', {
            changes: anonymizer.stats(),
            replacements: anonymizer.getStore().size
        })

        await writeDocument(outputPath, anonymized, opts.indentation ?? DEFAULT_INDENTATION)
    } catch (e) {
        if (e instanceof AnonymizeFileError) {
            throw e
        }
        throw new UnexpectedFailureError(opts.inputPath, e)
    }

    return outputPath
}

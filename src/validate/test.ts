import { deepEqual, ok, strictEqual, throws } from 'assert'
import { validate, ValidationError } from '.'

describe('Validate', () => {
    it('coerces and applies defaults', () => {
        strictEqual(validate('2', { schema: { type: 'integer', minimum: 0 } }), 2)

        deepEqual(
            validate(
                { indentation: '2', outputSuffix: '.anon' },
                { schema: {
                    type: 'object',
                    properties: {
                        log: {
                            type: 'object',
                            properties: {
                                level: { type: 'string', enum: ['error', 'info', 'debug'], default: 'info' }
                            },
                            required: ['level'],
                            default: {}
                        },
                        indentation: { type: 'integer', minimum: 0, maximum: 10, default: 4 },
                        outputSuffix: { type: 'string', minLength: 1 }
                    },
                    required: ['log', 'indentation', 'outputSuffix']
                } }
            ),
            { indentation: 2, outputSuffix: '.anon', log: { level: 'info' } }
        )
    })

    it('removes additional properties when asked', () => {
        deepEqual(
            validate(
                { keep: 'yes', drop: 'no' },
                { schema: { type: 'object', properties: { keep: { type: 'string' } }, additionalProperties: false }, removeAdditional: true }
            ),
            { keep: 'yes' }
        )
    })

    it('does not modify the given data', () => {
        const data = { nested: {} }

        validate(data, { schema: {
            type: 'object',
            properties: { nested: { type: 'object', properties: { value: { type: 'number', default: 1 } } } }
        } })

        deepEqual(data, { nested: {} })
    })

    it('throws with the failing path', () => {
        throws(
            () => validate(
                { log: { level: 'verbose' } },
                {
                    schema: {
                        type: 'object',
                        properties: { log: { type: 'object', properties: { level: { type: 'string', enum: ['info', 'debug'] } } } }
                    },
                    contextErrorMsg: 'Configuration'
                }
            ),
            (error: unknown) => {
                ok(error instanceof ValidationError)
                strictEqual(error.message, 'Configuration log.level must be equal to one of the allowed values')
                strictEqual(error.path, 'log.level')
                return true
            }
        )
    })
})

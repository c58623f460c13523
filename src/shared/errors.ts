export type ErrorCode =
    | 'INVALID_CONFIG'
    | 'DUPLICATE_KEY'

export type CodedError<TCode extends string = ErrorCode> = Error & {
    code: TCode
    retryable: boolean
    details?: Readonly<Record<string, unknown>>
    cause?: unknown
}

export function createCodedError<TCode extends string>(args: {
    code: TCode
    message: string
    retryable?: boolean
    details?: Readonly<Record<string, unknown>>
    cause?: unknown
}): CodedError<TCode> {
    const error: CodedError<TCode> = Object.assign(new Error(args.message), {
        code: args.code,
        retryable: args.retryable === true
    })
    error.name = 'WriteSafetyError'
    if (args.details !== undefined) {
        error.details = args.details
    }
    if (args.cause !== undefined) {
        error.cause = args.cause
    }
    return error
}

export function isCodedError<TCode extends string = ErrorCode>(value: unknown, code?: TCode): value is CodedError<TCode> {
    if (!(value instanceof Error)) return false
    if (!('code' in value) || !('retryable' in value)) return false
    if (typeof value.code !== 'string' || typeof value.retryable !== 'boolean') return false
    return code === undefined || value.code === code
}

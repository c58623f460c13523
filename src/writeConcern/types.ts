/** Acknowledging node count, or a named mode such as `'majority'`. */
export type W = number | string

/**
 * Acknowledgment policy for one write. Every key is optional and a missing key
 * means "no opinion"; keys the library does not know are carried through.
 */
export type WriteConcernOptions = {
    w?: W
    /** Milliseconds to wait for acknowledgment. */
    wtimeout?: number
    fsync?: boolean
    j?: boolean
    /** Alias of `j`; passed through, but not checked when deciding whether explicit options win. */
    journal?: boolean
    [key: string]: unknown
}

/** What `safely` accepts: a node count or a full options object. */
export type WriteConcernSpec = number | WriteConcernOptions

export type WriteConcernSource = 'explicit' | 'override' | 'default' | 'safeMode'

/**
 * Explicit execution context. Overrides are stored per context id, so two
 * operations in flight at the same time never see each other's override.
 */
export type WriteContext = Readonly<{
    id: string
}>

export type ConfigOk<T> = {
  readonly ok: true
  readonly value: T
}

export type ConfigErr<E> = {
  readonly ok: false
  readonly error: E
}

/**
 * Outcome of a fallible configuration step that reports failure as a value
 * instead of throwing.
 */
export type ConfigResult<T, E = Error> = ConfigOk<T> | ConfigErr<E>

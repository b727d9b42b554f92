import type { ConfigErr, ConfigOk } from "../ports/result"

export function ok<T>(value: T): ConfigOk<T> {
  return { ok: true, value }
}

export function err<E>(error: E): ConfigErr<E> {
  return { ok: false, error }
}

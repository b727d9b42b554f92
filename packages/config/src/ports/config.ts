type Leaf =
  | string
  | number
  | boolean
  | bigint
  | symbol
  | null
  | undefined
  | Date
  | readonly unknown[]
  | ((...args: never[]) => unknown)

/**
 * Every dotted path into T, down to its leaves.
 *
 * @example
 * ```typescript
 * type P = ConfigPath<{ db: { host: string; port: number }; debug: boolean }>
 * // "db" | "db.host" | "db.port" | "debug"
 * ```
 */
export type ConfigPath<T> = {
  [K in keyof T & string]: NonNullable<T[K]> extends Leaf
    ? K
    : K | `${K}.${ConfigPath<NonNullable<T[K]>>}`
}[keyof T & string]

/**
 * Configuration container providing type-safe access to validated configuration values.
 *
 * @typeParam T - The shape of the configuration object, typically inferred from a Zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     server: z.object({ port: z.number().default(3000) }),
 *     debug: z.boolean().default(false),
 *   }),
 *   sources: [createSafeEnvSource({ prefix: "APP" })],
 * })
 *
 * config.get("server").port  // 8080
 * config.explain("server.port") // "the environment"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object, deeply frozen */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /** Top-level keys of the validated config */
  keys(): (keyof T & string)[]

  /**
   * Explains which source provided the final value at a leaf path.
   *
   * @returns The source name, or "default" when a schema default (or nothing) supplied it.
   */
  explain(path: ConfigPath<T>): string

  /**
   * Returns the names of all sources that contributed at least one value,
   * in the order they were first applied.
   */
  sourcesUsed(): string[]

  /**
   * Returns leaf paths present in sources but dropped by the schema.
   *
   * Useful for detecting typos, stale config, or misconfigured sources.
   */
  unknownKeys(): string[]
}

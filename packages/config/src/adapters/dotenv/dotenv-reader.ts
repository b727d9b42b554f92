import fs from "node:fs"
import path from "node:path"
import { parse } from "dotenv"
import { ConfigError } from "../../core/errors"
import {
  type RawEnvironmentEntry,
  type RawEnvironmentReader,
  toUnicode,
} from "../env/raw-environment"
import {
  createSafeEnvSource,
  type SafeEnvSource,
  type SafeEnvSourceDeps,
  type SafeEnvSourceInit,
} from "../env/safe-env-source"

/**
 * Options for reading a .env file as a raw environment.
 */
export type DotenvReaderOptions = {
  /**
   * Path to the .env file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production", "./config/.env.defaults"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: the reader throws if the file is not found.
   * - `false`: a missing file reads as an empty environment.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

const encoder = new TextEncoder()

/**
 * Reads a .env file synchronously, once per call, into raw entries.
 *
 * The file is decoded strictly as UTF-8 and a file that fails is unreadable.
 * Entries are handed over as bytes, so unlike `process.env` a real U+FFFD in
 * the file is kept.
 */
export function dotenvFileReader(opts: DotenvReaderOptions): RawEnvironmentReader {
  return () => {
    const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

    let content: Buffer

    try {
      content = fs.readFileSync(filePath)
    } catch (err) {
      if (!opts.required && isMissingFile(err)) return []
      throw err
    }

    const text = toUnicode(content)
    if (text === undefined) {
      throw new ConfigError(`${filePath} is not valid UTF-8`, {
        code: "config_source_failed",
        context: { file: filePath },
      })
    }

    return Object.entries(parse(text)).map(
      ([key, value]): RawEnvironmentEntry => [encoder.encode(key), encoder.encode(value)],
    )
  }
}

/**
 * A SafeEnvSource over a .env file instead of the process environment,
 * named `dotenv:<file>`.
 */
export function createDotenvSource(
  opts: DotenvReaderOptions & SafeEnvSourceInit,
  deps: Omit<SafeEnvSourceDeps, "reader" | "origin"> = {},
): SafeEnvSource {
  const { file, required, cwd, ...init } = opts

  return createSafeEnvSource(init, {
    ...deps,
    reader: dotenvFileReader({ file, required, ...(cwd !== undefined ? { cwd } : {}) }),
    origin: `dotenv:${file}`,
  })
}

export {
  createDotenvSource,
  type DotenvReaderOptions,
  dotenvFileReader,
} from "./adapters/dotenv/dotenv-reader"
export {
  inferValue,
  parseBoolean,
  parseFloat64,
  parseInteger,
} from "./adapters/env/infer-value"
export {
  processEnvironmentReader,
  type RawEnvironmentEntry,
  type RawEnvironmentReader,
  type RawOsString,
  readProcessEnvironment,
  toUnicode,
} from "./adapters/env/raw-environment"
export {
  DEFAULT_KEY_SEPARATOR,
  DEFAULT_LIST_SEPARATOR,
  DEFAULT_PREFIX_SEPARATOR,
  ENVIRONMENT_ORIGIN,
  type SafeEnvOptions,
} from "./adapters/env/safe-env-options"
export {
  createSafeEnvSource,
  SafeEnvSource,
  type SafeEnvSourceDeps,
  type SafeEnvSourceInit,
} from "./adapters/env/safe-env-source"
export {
  type EnvKeyFilter,
  type RawEnvironmentSnapshot,
  type SnapshotDropReason,
  type SnapshotStats,
  snapshotEnvironment,
} from "./adapters/env/snapshot"
export { processKey, transformSnapshot } from "./adapters/env/transform"
export { ObjectSource } from "./adapters/object/object-source"
export { Config } from "./core/config"
export { ConfigError, type ConfigErrorCode } from "./core/errors"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export { err, ok } from "./core/result"
export { toPlainObject, unwrapValue } from "./core/value"
export type { ConfigPath, IConfig } from "./ports/config"
export type { ConfigErr, ConfigOk, ConfigResult } from "./ports/result"
export type { ConfigSource, ValueSource } from "./ports/source"
export type { ConfigValue, ValueKind, ValueMap } from "./ports/value"

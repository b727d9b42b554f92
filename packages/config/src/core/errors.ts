import { BaseError } from "@envlayer/errors"

export type ConfigErrorCode = "config_source_failed" | "config_validation_failed"

export class ConfigError extends BaseError<ConfigErrorCode> {}

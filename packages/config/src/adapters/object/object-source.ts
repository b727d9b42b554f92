import { expandPaths } from "../../core/value"
import type { ConfigSource } from "../../ports/source"

/**
 * In-process values, typically command-line overrides. Dotted keys are
 * expanded, so `{ "server.port": 8080 }` loads as `{ server: { port: 8080 } }`.
 */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: Readonly<Record<string, unknown>>,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return expandPaths(Object.entries(structuredClone(this.values)))
  }
}

import type { ConfigPath, IConfig } from "../ports/config"
import { deepFreeze, flattenLeaves } from "./value"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  private readonly leafPaths: ReadonlySet<string>

  constructor(
    private readonly data: T,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly mergedPaths: ReadonlySet<string>,
  ) {
    deepFreeze(this.data)
    this.leafPaths = new Set(
      Array.from(flattenLeaves(this.data), ([segments]) => segments.join(".")),
    )
  }

  get value(): T {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  keys(): (keyof T & string)[] {
    return Object.keys(this.data) as Array<keyof T & string>
  }

  explain(path: ConfigPath<T>): string {
    return this.provenance.get(String(path)) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())].filter((name) => name !== "default")
  }

  unknownKeys(): string[] {
    return [...this.mergedPaths].filter((path) => !this.leafPaths.has(path))
  }
}

import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Absolute, or relative to `cwd`.
   *
   * @example ".env", ".env.production"
   */
  file: string

  /** When false a missing file loads as empty. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

const isNotFound = (err: unknown): boolean =>
  err instanceof Error && "code" in err && err.code === "ENOENT"

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, string | undefined>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) return {}
      throw err
    }

    return parse(content)
  }
}

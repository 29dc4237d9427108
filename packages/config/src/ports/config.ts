/**
 * Validated configuration, together with where each value came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     SMTP_SERVER: z.string(),
 *     SMTP_PORT: z.coerce.number().default(25),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.SMTP_PORT          // 25
 * config.explain("SMTP_SERVER")   // "env"
 * config.explain("SMTP_PORT")     // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that supplied the final value of `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Source names that contributed at least one value, without duplicates. */
  sourcesUsed(): string[]

  /**
   * Keys some source provided that the schema does not know. Usually a typo
   * or a setting left over from an older release.
   */
  unknownKeys(): string[]
}

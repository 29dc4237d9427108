/**
 * Where raw configuration comes from.
 *
 * A source only loads. Validation, coercion and merging happen in
 * `loadConfig`, which applies sources in order so later ones override
 * earlier ones.
 */
export interface ConfigSource {
  /** Used for provenance, e.g. `"env"` or `"dotenv:.env.production"`. */
  readonly name: string

  /**
   * Flat key/value pairs. An `undefined` value means "not provided" and
   * never overrides an earlier source.
   */
  load(): Promise<Record<string, string | undefined>>
}

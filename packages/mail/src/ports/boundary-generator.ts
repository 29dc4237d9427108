/** Produces MIME boundary tokens. Uniqueness only has to avoid accidental collisions. */
export interface BoundaryGenerator {
  generate(): string
}

import { customAlphabet } from "nanoid"
import type { BoundaryGenerator } from "../../ports/boundary-generator"

export const BASE36_ALPHABET = "0123456789abcdefghijklmnopqrstuvwxyz"

export const base36Boundaries = (size = 16): BoundaryGenerator => {
  const generate = customAlphabet(BASE36_ALPHABET, size)

  return { generate: () => generate() }
}

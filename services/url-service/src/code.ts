import { customRandom, random } from "nanoid";
import { GenerationError } from "./errors.js";

export const CODE_ALPHABET = "0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
export const CODE_LENGTH = 8;
export const MAX_ALLOCATION_ATTEMPTS = 5;

/** Fills a buffer of the requested size with random bytes. */
export type RandomSource = (bytes: number) => Uint8Array;

export type CodeGenerator = (length: number) => string;

/**
 * Draws `length` characters uniformly from CODE_ALPHABET.
 * nanoid rejects out-of-range bytes instead of taking a modulo, so there is no bias.
 */
export function generateCode(length: number = CODE_LENGTH, source: RandomSource = random): string {
  try {
    return customRandom(CODE_ALPHABET, length, source)();
  } catch (err) {
    throw new GenerationError({ cause: err });
  }
}

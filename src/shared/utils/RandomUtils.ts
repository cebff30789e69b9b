import seedrandom from "seedrandom";

/**
 * Shared utility for random number generation.
 *
 * Backed by one process-wide seeded generator: the sequence is reproducible
 * for a given seed and starts over only when `seed()` is called again, which
 * the container does on every (re)start.
 */
export class RandomUtils {
  private static rng: seedrandom.PRNG = seedrandom("200");

  /**
   * Reseeds the process-wide generator.
   */
  public static seed(seed: string | number): void {
    RandomUtils.rng = seedrandom(String(seed));
  }

  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public static float(): number {
    return RandomUtils.rng();
  }

  /**
   * Returns a random integer between 0 (inclusive) and `n` (exclusive).
   */
  public static intBelow(n: number): number {
    return Math.floor(RandomUtils.rng() * n);
  }

  /**
   * Index in `[0, n)` drawn as the larger of two independent uniform draws,
   * which favours later indices. Returns `undefined` when `n` is 0.
   */
  public static biasedHighIndex(n: number): number | undefined {
    if (n <= 0) return undefined;
    return Math.max(RandomUtils.intBelow(n), RandomUtils.intBelow(n));
  }
}

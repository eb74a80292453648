/**
 * Fuente de aleatoriedad inyectable.
 * Los tests pasan una implementación determinista; producción usa SeededRandom.
 */
export interface RandomSource {
  /** Entero uniforme en [0, maxExclusive) */
  nextInt(maxExclusive: number): number
}

/**
 * PRNG xorshift32. No es criptográficamente seguro; con la misma semilla
 * produce siempre la misma secuencia.
 */
export class SeededRandom implements RandomSource {
  private state: number

  constructor(seed: number) {
    // Forzar a uint32 (xorshift no admite estado 0)
    this.state = seed >>> 0 || 0x12345678
  }

  private nextU32(): number {
    let x = this.state
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    this.state = x >>> 0
    return this.state
  }

  nextFloat(): number {
    return this.nextU32() / 0x1_0000_0000
  }

  nextInt(maxExclusive: number): number {
    const m = Math.trunc(maxExclusive)
    if (!Number.isFinite(m) || m <= 0) {
      throw new RangeError('nextInt(maxExclusive) requires maxExclusive > 0')
    }
    return Math.floor(this.nextFloat() * m)
  }
}

/**
 * Crea la fuente compartida por el proceso.
 * Sin semilla configurada se usa reloj + pid, para que dos arranques no repitan secuencia.
 */
export function createRandomSource(seed?: number): RandomSource {
  return new SeededRandom(seed ?? (Date.now() ^ (process.pid << 16)))
}

/**
 * Muestreo uniforme sin reemplazo (Fisher-Yates parcial).
 * Devuelve min(n, k) índices distintos en [0, n).
 */
export function sampleIndices(n: number, k: number, random: RandomSource): number[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`sampleIndices: n must be a non-negative integer, got ${n}`)
  }
  if (!Number.isInteger(k) || k < 0) {
    throw new RangeError(`sampleIndices: k must be a non-negative integer, got ${k}`)
  }

  const count = Math.min(n, k)
  const indices = Array.from({ length: n }, (_, i) => i)

  for (let i = 0; i < count; i++) {
    const j = i + random.nextInt(n - i)
    ;[indices[i], indices[j]] = [indices[j], indices[i]]
  }

  return indices.slice(0, count)
}

/**
 * Toma k elementos al azar de la lista, sin repetir.
 */
export function sample<T>(items: readonly T[], k: number, random: RandomSource): T[] {
  return sampleIndices(items.length, k, random).map(i => items[i])
}

/**
 * Un solo elemento al azar, o undefined si la lista está vacía.
 */
export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
  return sample(items, 1, random)[0]
}

export interface LazyOne<T> {
  get: T
}

/** Lazily computed values */
export const LazyX = {
  /** Compute once on first read, then return the cached value */
  once<F>(fn: () => F): LazyOne<F> {
    let cell: { value: F } | undefined
    return {
      get get() {
        if (!cell) cell = { value: fn() }
        return cell.value
      },
    }
  },
}

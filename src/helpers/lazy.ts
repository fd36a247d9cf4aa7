/**
 * Compute-once cell: the factory runs on first access and its result is
 * published for every later call. A factory that throws leaves the cell
 * empty so the error surfaces again on the next access.
 */
export function lazy<T>(factory: () => T): () => T {
  let cell: { readonly value: T } | undefined

  return () => {
    if (!cell) {
      cell = Object.freeze({ value: factory() })
    }
    return cell.value
  }
}

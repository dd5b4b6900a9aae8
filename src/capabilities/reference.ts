/** Strips the `@version` suffix of a `uses:` reference. */
export function referenceName(uses: string): string {
  const at = uses.lastIndexOf('@')
  return at > 0 ? uses.slice(0, at) : uses
}

/**
 * Keep only the keys starting with `prefix`, with the prefix removed.
 * An empty or missing prefix keeps every key.
 */
export function stripPrefix<V>(
  values: Readonly<Record<string, V>>,
  prefix: string | undefined,
): Record<string, V> {
  if (!prefix) return { ...values }

  const filtered: Record<string, V> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) {
      filtered[key.slice(prefix.length)] = value
    }
  }

  return filtered
}

export interface ParsedProperty {
  /** Property as given, including any `:options:` prefix. */
  raw: string
  path: string
  segments: readonly string[]
  options: readonly string[]
}

/**
 * Split `:slerp,other:rotation.y` into its options and its member path.
 */
export function parseProperty(property: string): ParsedProperty {
  let path = property
  let options: string[] = []

  if (property.startsWith(':')) {
    const end = property.indexOf(':', 1)
    if (end > 0) {
      options = property
        .slice(1, end)
        .split(',')
        .map(option => option.trim())
        .filter(option => option.length > 0)
      path = property.slice(end + 1)
    }
  }

  return {
    raw: property,
    path,
    segments: path.split('.'),
    options
  }
}

/**
 * Whitespace token count used for echo-mode usage figures. Independent of any
 * model vocabulary.
 */
export function countTokens(text: string | null | undefined): number {
  if (!text) return 0
  const trimmed = text.trim()
  if (!trimmed) return 0
  return trimmed.split(/\s+/).length
}

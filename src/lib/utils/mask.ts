// ── Secret masking ──

/**
 * Replace known secret values and common credential shapes with `***`.
 * `secrets` holds values substituted from `${{ secrets.* }}` markers.
 */
export function maskSecrets(text: string, secrets: readonly string[] = []): string {
  let masked = text;
  for (const secret of secrets) {
    if (secret.length < 3) continue;
    masked = masked.split(secret).join('***');
  }
  return masked
    .replace(/(?:sk-|pk-|token_)[a-zA-Z0-9]{20,}/g, '***')
    .replace(/(Bearer|Basic)\s+\S{20,}/g, '$1 ***')
    .replace(/(?:password|secret|key|token)=\S+/gi, (m) => m.split('=')[0] + '=***');
}

/**
 * Turn a model identifier or name into a safe file name stem.
 *
 * `meta-llama/Llama-3 (8B)` -> `meta-llama_llama-3-8b`
 */
export function sanitizeFilename(name: string): string {
  return name
    .toLowerCase()
    .replace(/ /g, '-')
    .replace(/[[\]{}()]/g, '')
    .replace(/[^\p{L}\p{N}_.-]/gu, '_')
    .replace(/_+/g, '_')
    .replace(/-+/g, '-')
    .replace(/[-_]+$/, '');
}

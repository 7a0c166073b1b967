/**
 * Rule type guidance checks.
 *
 * Guidance is shown to users next to failing evaluations, so it must be
 * plain text: bounded in size, valid UTF-8 and free of markup.
 */

export const MAX_GUIDANCE_BYTES = 4 * 1024;

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

// Start, end and self-closing tags, comments and doctype declarations.
const HTML_TAG = /<\/?[a-zA-Z][a-zA-Z0-9-]*(?:\s[^<>]*)?\/?>|<!--[\s\S]*?-->|<![a-zA-Z][^<>]*>/;

/** Returns the reason the guidance is rejected, or null. */
export function validateGuidance(guidance: string): string | null {
  if (LONE_SURROGATE.test(guidance)) {
    return 'guidance is not valid UTF-8';
  }
  const size = Buffer.byteLength(guidance, 'utf8');
  if (size > MAX_GUIDANCE_BYTES) {
    return `guidance too long: ${size} bytes, the limit is ${MAX_GUIDANCE_BYTES}`;
  }
  if (HTML_TAG.test(guidance)) {
    return 'guidance contains HTML';
  }
  return null;
}

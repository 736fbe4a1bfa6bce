// src/llm/sanitize.ts

/**
 * @file Scrubs executable fragments (script tags, `javascript:` URLs, inline event
 * handlers, eval/exec calls) out of model output before it reaches clients.
 */

export const FILTERED_PLACEHOLDER = '[FILTERED]';

const DANGEROUS_PATTERNS: readonly RegExp[] = [
  /<script[^>]*>[\s\S]*?<\/script>/gi,
  /javascript:/gi,
  /\bon\w+\s*=/gi,
  /\beval\s*\(/gi,
  /__import__\s*\(/gi,
  /\bexec\s*\(/gi,
  /\bos\.system/gi,
];

export function sanitizeModelOutput(text: string): string {
  if (!text) {
    return '';
  }
  return DANGEROUS_PATTERNS.reduce((cleaned, pattern) => cleaned.replace(pattern, FILTERED_PLACEHOLDER), text);
}

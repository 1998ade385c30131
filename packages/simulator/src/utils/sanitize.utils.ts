/**
 * Strips control characters and zero-width unicode that spreadsheet exports
 * tend to carry, and normalises Windows line endings.
 */
export const sanitizeCell = (input: string): string => {
  return (
    input
      .replace(/\r\n?/g, '\n')
      // ASCII control characters except tab and newline
      // eslint-disable-next-line no-control-regex
      .replace(/[\x00-\x08\x0B-\x1F\x7F]/g, '')
      .replace(/[\u200B-\u200F\u2028-\u202F\u205F-\u206F\uFEFF]/g, '')
  );
};

/**
 * sanitizeCell plus soft hyphen stripping, newline collapsing and trimming.
 * Applied to problem statements before they are posed to the model.
 */
export const sanitizeForPrompt = (input: string): string => {
  return sanitizeCell(input)
    .replace(/\u00AD/g, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
};

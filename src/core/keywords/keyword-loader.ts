/**
 * Keyword list resources: one keyword per line, blank lines ignored.
 */
import { readFileSync } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { normalizeKeywords } from './keyword-set.js';

/**
 * Parse a newline-separated keyword list.
 * Lines are trimmed and upper-cased; blank lines and duplicates are dropped.
 */
export function parseKeywordList(content: string): string[] {
  return normalizeKeywords(content.split(/\r?\n/));
}

/**
 * Read and parse a keyword list file. This is a one-shot synchronous read
 * done while a dialect is being built.
 */
export function loadKeywordList(filePath: string): string[] {
  let content: string;
  try {
    content = readFileSync(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to read keyword list: ${filePath}`,
      { filePath, originalError: error instanceof Error ? error.message : String(error) }
    );
  }
  return parseKeywordList(content);
}

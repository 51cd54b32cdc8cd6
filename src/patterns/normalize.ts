/**
 * @fileoverview Log line normalization
 *
 * One pattern table serves two masking levels:
 * - `presentation`: conservative, keeps diagnostic detail such as line numbers.
 *   Used for manifests and drill-down output.
 *   `/var/lib/ci/workspace/src/main.go:42` -> `.../main.go:42`
 * - `recurrence`: aggressive, used to derive deduplication keys.
 *   `Error on line 42` -> `Error on line [NUM]`
 *
 * Both levels are pure and total: a pattern that does not match is a no-op.
 */

export type MaskingLevel = 'presentation' | 'recurrence';

// ============================================================================
// PATTERN TABLE
// ============================================================================

const PATTERNS = Object.freeze({
  /** ISO-8601-ish timestamps: 2024-05-21T10:00:05.123Z, 2024-05-21 10:00:05,123 */
  timestamp: /\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:[.,]\d+)?(?:Z|[+-]\d{2}:?\d{2})?/g,
  /** Same as `timestamp`, for locating the first match without shared lastIndex state. */
  leadingTimestamp: /\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:[.,]\d+)?(?:Z|[+-]\d{2}:?\d{2})?/,
  uuid: /\b[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}\b/g,
  /** Container IDs, commit SHAs: 12+ bare lowercase hex chars. */
  longHash: /\b[a-f0-9]{12,}\b/g,
  hexAddress: /\b0x[0-9a-fA-F]+\b/g,
  number: /\b\d+\b/g,
  /** Absolute path with 3+ directories; group 1 is the filename and optional `:line`. */
  longPath: /\/(?:[^/\s]+\/){3,}([^/\s:]+(?::\d+)?)/g,
  whitespace: /\s+/g,
});

const PLACEHOLDERS: Record<MaskingLevel, { uuid: string; hex: string }> = {
  presentation: { uuid: '<UUID>', hex: '<HEX>' },
  recurrence: { uuid: '[UUID]', hex: '[HEX]' },
};

const HASH_PLACEHOLDER = '<HASH>';

/** Leading timestamps are stripped only when they start before this offset. */
const LEADING_TIMESTAMP_MAX_OFFSET = 5;

/** Shorter shared prefixes are left in place. */
export const MIN_COMMON_PREFIX_LENGTH = 20;

export const COMMON_PREFIX_MARKER = '... ';

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Normalize a single line at the given masking level.
 */
export function normalize(line: string, level: MaskingLevel): string {
  let result = maskTimestamps(line, level);
  result = result.replace(PATTERNS.uuid, PLACEHOLDERS[level].uuid);
  result = result.replace(PATTERNS.hexAddress, PLACEHOLDERS[level].hex);

  switch (level) {
    case 'presentation':
      result = result.replace(PATTERNS.longPath, '.../$1');
      result = result.replace(PATTERNS.longHash, HASH_PLACEHOLDER);
      // Path compression can pull a dated last segment (`/logs/2024-05-21T10:00:05Z`)
      // to the front of the line.
      result = stripLeadingTimestamps(result);
      break;
    case 'recurrence':
      result = result.replace(PATTERNS.longPath, '[PATH]');
      result = result.replace(PATTERNS.longHash, HASH_PLACEHOLDER);
      result = result.replace(PATTERNS.number, '[NUM]');
      break;
  }

  return collapseWhitespace(result);
}

/**
 * Normalize a batch of lines. In presentation mode a shared prefix of at least
 * {@link MIN_COMMON_PREFIX_LENGTH} characters (typically a structured-logger
 * preamble) is replaced by {@link COMMON_PREFIX_MARKER} on every line.
 */
export function normalizeLines(lines: readonly string[], level: MaskingLevel): string[] {
  const normalized = lines.map((line) => normalize(line, level));
  if (level !== 'presentation') {
    return normalized;
  }
  return removeCommonPrefix(normalized);
}

/**
 * Longest prefix shared by every line, or '' when there are fewer than two
 * lines or the prefix is shorter than {@link MIN_COMMON_PREFIX_LENGTH}.
 */
export function findCommonPrefix(lines: readonly string[]): string {
  if (lines.length < 2) {
    return '';
  }

  let prefix = lines[0] ?? '';
  for (const line of lines.slice(1)) {
    while (prefix.length > 0 && (line.length < prefix.length || !line.startsWith(prefix))) {
      prefix = prefix.slice(0, -1);
    }
    if (prefix.length === 0) {
      break;
    }
  }

  return prefix.length >= MIN_COMMON_PREFIX_LENGTH ? prefix : '';
}

/** Presentation-level normalization of a single line. */
export function compressLine(line: string): string {
  return normalize(line, 'presentation');
}

/** Presentation-level normalization of context lines, with prefix removal. */
export function compressContextLines(lines: readonly string[]): string[] {
  return normalizeLines(lines, 'presentation');
}

// ============================================================================
// TRANSFORMS
// ============================================================================

function maskTimestamps(line: string, level: MaskingLevel): string {
  if (level === 'recurrence') {
    return line.replace(PATTERNS.timestamp, '[TIMESTAMP]');
  }
  return stripLeadingTimestamps(line);
}

/**
 * Drop timestamps starting before {@link LEADING_TIMESTAMP_MAX_OFFSET} until
 * none is left. Offsets are measured on collapsed text.
 */
function stripLeadingTimestamps(line: string): string {
  let result = collapseWhitespace(line);
  for (;;) {
    const match = PATTERNS.leadingTimestamp.exec(result);
    if (!match || match.index >= LEADING_TIMESTAMP_MAX_OFFSET) {
      return result;
    }
    result = result.slice(match.index + match[0].length).trim();
  }
}

function collapseWhitespace(line: string): string {
  return line.replace(PATTERNS.whitespace, ' ').trim();
}

function removeCommonPrefix(lines: string[]): string[] {
  const prefix = findCommonPrefix(lines);
  if (prefix === '') {
    return lines;
  }
  return lines.map((line) => COMMON_PREFIX_MARKER + line.slice(prefix.length));
}
